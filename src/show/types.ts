// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Model description consumed by the report renderer.
 */

/**
 * A single metadata value. Model metadata mixes strings, numbers and
 * booleans, so each value carries its kind.
 */
export type MetadataValue =
  | { kind: 'string'; value: string }
  | { kind: 'number'; value: number }
  | { kind: 'bool'; value: boolean };

/** Dotted metadata key → value, e.g. `llama.context_length`. */
export type Metadata = ReadonlyMap<string, MetadataValue>;

export interface ModelDetails {
  family?: string;
  /** Human-scale size as reported by the server, e.g. "7B" */
  parameterSize?: string;
  quantizationLevel?: string;
}

export interface TensorInfo {
  name: string;
  type: string;
  shape: readonly number[];
}

export interface ModelDescription {
  details: ModelDetails;
  modelInfo: Metadata;
  /** Secondary (vision) projector model; empty when absent */
  projectorInfo: Metadata;
  /** Newline-delimited `key value` lines */
  parameters: string;
  tensors: readonly TensorInfo[];
  system: string;
  license: string;
  capabilities: readonly string[];
}

export const ARCHITECTURE_KEY = 'general.architecture';
export const PARAMETER_COUNT_KEY = 'general.parameter_count';

export function stringValue(value: string): MetadataValue {
  return { kind: 'string', value };
}

export function numberValue(value: number): MetadataValue {
  return { kind: 'number', value };
}

export function boolValue(value: boolean): MetadataValue {
  return { kind: 'bool', value };
}

/**
 * Build a description with every optional part empty.
 * Callers spread their own fields over it.
 */
export function emptyModelDescription(): ModelDescription {
  return {
    details: {},
    modelInfo: new Map(),
    projectorInfo: new Map(),
    parameters: '',
    tensors: [],
    system: '',
    license: '',
    capabilities: [],
  };
}

/**
 * Build a metadata map from plain entries, e.g. in tests or fixtures.
 */
export function metadataFrom(entries: Record<string, string | number | boolean>): Metadata {
  const map = new Map<string, MetadataValue>();
  for (const [key, value] of Object.entries(entries)) {
    if (typeof value === 'string') {
      map.set(key, stringValue(value));
    } else if (typeof value === 'number') {
      map.set(key, numberValue(value));
    } else {
      map.set(key, boolValue(value));
    }
  }
  return map;
}

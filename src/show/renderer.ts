// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Model report renderer.
 * Turns a model description into titled, column-aligned sections.
 */

import type { OutputSink } from '../output/sink.js';
import { writeTo } from '../output/sink.js';
import { formatTable } from './table.js';
import { formatNumber, formatParameterCount, formatPlainNumber } from './format.js';
import {
  ARCHITECTURE_KEY,
  PARAMETER_COUNT_KEY,
  type Metadata,
  type MetadataValue,
  type ModelDescription,
  type TensorInfo,
} from './types.js';

/** Maximum system prompt lines shown before eliding the rest. */
export const SYSTEM_PREVIEW_LINES = 2;

export type SectionTitle =
  | 'Model'
  | 'Parameters'
  | 'Metadata'
  | 'Tensors'
  | 'Projector'
  | 'System'
  | 'License'
  | 'Capabilities';

export interface Section {
  title: SectionTitle;
  rows: string[][];
}

// ============================================================================
// Value helpers
// ============================================================================

/**
 * Format a metadata value for display.
 */
export function formatMetadataValue(entry: MetadataValue): string {
  switch (entry.kind) {
    case 'string':
      return entry.value;
    case 'number':
      return formatNumber(entry.value);
    case 'bool':
      return entry.value ? 'true' : 'false';
  }
}

function stringAt(info: Metadata, key: string): string | undefined {
  const entry = info.get(key);
  return entry?.kind === 'string' ? entry.value : undefined;
}

function numberAt(info: Metadata, key: string): number | undefined {
  const entry = info.get(key);
  return entry?.kind === 'number' ? entry.value : undefined;
}

/**
 * Find a numeric value by its preferred key, falling back to the first key
 * (in sorted order) that contains `fragment`.
 */
function findNumber(info: Metadata, preferredKey: string | undefined, fragment: string): number | undefined {
  if (preferredKey !== undefined) {
    const preferred = numberAt(info, preferredKey);
    if (preferred !== undefined) {
      return preferred;
    }
  }
  const fallback = [...info.keys()].sort().find((key) => key.includes(fragment) && numberAt(info, key) !== undefined);
  return fallback === undefined ? undefined : numberAt(info, fallback);
}

function sortedEntries(info: Metadata): [string, MetadataValue][] {
  return [...info.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
}

/**
 * Split text into lines with trailing whitespace removed.
 */
function textLines(text: string): string[] {
  return text.split('\n').map((line) => line.trimEnd());
}

function dropTrailingEmpty(lines: string[]): string[] {
  let end = lines.length;
  while (end > 0 && lines[end - 1] === '') {
    end--;
  }
  return lines.slice(0, end);
}

// ============================================================================
// Section builders
// ============================================================================

function modelSection(description: ModelDescription): Section {
  const { details, modelInfo } = description;
  const rows: string[][] = [];

  const architecture = stringAt(modelInfo, ARCHITECTURE_KEY) ?? details.family;
  if (architecture) {
    rows.push(['architecture', architecture]);
  }

  let parameters = details.parameterSize;
  if (!parameters) {
    const count = numberAt(modelInfo, PARAMETER_COUNT_KEY);
    parameters = count === undefined ? undefined : formatParameterCount(count);
  }
  if (parameters) {
    rows.push(['parameters', parameters]);
  }

  const arch = stringAt(modelInfo, ARCHITECTURE_KEY);
  const contextLength = findNumber(modelInfo, arch && `${arch}.context_length`, 'context_length');
  if (contextLength !== undefined) {
    rows.push(['context length', formatPlainNumber(contextLength)]);
  }
  const embeddingLength = findNumber(modelInfo, arch && `${arch}.embedding_length`, 'embedding_length');
  if (embeddingLength !== undefined) {
    rows.push(['embedding length', formatPlainNumber(embeddingLength)]);
  }

  if (details.quantizationLevel) {
    rows.push(['quantization', details.quantizationLevel]);
  }

  return { title: 'Model', rows };
}

/**
 * Parse `key value` lines. Repeated keys stay as separate rows.
 */
export function parseParameterLines(parameters: string): [string, string][] {
  const rows: [string, string][] = [];
  for (const raw of parameters.split('\n')) {
    const line = raw.trim();
    if (!line) continue;
    const match = /^(\S+)\s*(.*)$/.exec(line);
    if (match) {
      rows.push([match[1], match[2].trim()]);
    }
  }
  return rows;
}

function parametersSection(description: ModelDescription): Section {
  return { title: 'Parameters', rows: parseParameterLines(description.parameters) };
}

function metadataSection(description: ModelDescription): Section {
  return {
    title: 'Metadata',
    rows: sortedEntries(description.modelInfo).map(([key, entry]) => [key, formatMetadataValue(entry)]),
  };
}

export function formatShape(shape: readonly number[]): string {
  return `[${shape.join(' ')}]`;
}

function tensorsSection(tensors: readonly TensorInfo[]): Section {
  return {
    title: 'Tensors',
    rows: tensors.map((tensor) => [tensor.name, tensor.type, formatShape(tensor.shape)]),
  };
}

function projectorSection(projector: Metadata): Section {
  const rows: string[][] = [];
  const arch = stringAt(projector, ARCHITECTURE_KEY);
  if (arch) {
    rows.push(['architecture', arch]);
  }

  const count = numberAt(projector, PARAMETER_COUNT_KEY);
  if (count !== undefined) {
    rows.push(['parameters', formatParameterCount(count)]);
  }

  const embeddingLength = findNumber(projector, arch && `${arch}.vision.embedding_length`, 'embedding_length');
  if (embeddingLength !== undefined) {
    rows.push(['embedding length', formatPlainNumber(embeddingLength)]);
  }
  const dimensions = findNumber(projector, arch && `${arch}.vision.projection_dim`, 'projection_dim');
  if (dimensions !== undefined) {
    rows.push(['dimensions', formatPlainNumber(dimensions)]);
  }

  return { title: 'Projector', rows };
}

function systemSection(system: string): Section {
  const lines = textLines(system).filter((line) => line !== '');
  const rows = lines.slice(0, SYSTEM_PREVIEW_LINES).map((line) => [line]);
  if (lines.length > SYSTEM_PREVIEW_LINES) {
    rows.push(['...']);
  }
  return { title: 'System', rows };
}

function licenseSection(license: string): Section {
  return { title: 'License', rows: dropTrailingEmpty(textLines(license)).map((line) => [line]) };
}

function capabilitiesSection(capabilities: readonly string[]): Section {
  return { title: 'Capabilities', rows: capabilities.map((capability) => [capability.toLowerCase()]) };
}

/**
 * Build the report sections in display order. The Model section is
 * always first; the others appear only when they have rows.
 */
export function buildSections(description: ModelDescription, verbose: boolean): Section[] {
  const optional: Section[] = [parametersSection(description)];

  if (verbose) {
    optional.push(metadataSection(description));
    optional.push(tensorsSection(description.tensors));
  }

  optional.push(
    projectorSection(description.projectorInfo),
    systemSection(description.system),
    licenseSection(description.license),
    capabilitiesSection(description.capabilities)
  );

  return [modelSection(description), ...optional.filter((section) => section.rows.length > 0)];
}

/**
 * Render sections to text: a `  Title` header, the indented table, then
 * one blank line.
 */
export function formatSections(sections: readonly Section[]): string {
  let output = '';
  for (const section of sections) {
    output += `  ${section.title}\n`;
    // The leading empty column produces the row indent
    for (const line of formatTable(section.rows.map((row) => ['', ...row]))) {
      output += line + '\n';
    }
    output += '\n';
  }
  return output;
}

/**
 * Render a model report to the sink in a single write.
 * Throws SinkWriteError when the sink fails; incomplete descriptions
 * simply produce fewer rows.
 */
export function renderModelInfo(description: ModelDescription, verbose: boolean, sink: OutputSink): void {
  writeTo(sink, formatSections(buildSections(description, verbose)));
}

// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Model info conversion.
 * Maps a /api/show response onto the renderer's ModelDescription.
 */

import { logger } from '../logger.js';
import type { ShowResponse } from './types.js';
import {
  boolValue,
  numberValue,
  stringValue,
  type Metadata,
  type MetadataValue,
  type ModelDescription,
  type TensorInfo,
} from '../show/types.js';

/**
 * Convert a raw metadata record into tagged values.
 * Arrays and nested objects (e.g. tokenizer vocabularies) are skipped.
 */
export function toMetadata(raw: Record<string, unknown> | undefined): Metadata {
  const map = new Map<string, MetadataValue>();
  if (!raw) {
    return map;
  }

  for (const [key, value] of Object.entries(raw)) {
    if (typeof value === 'string') {
      map.set(key, stringValue(value));
    } else if (typeof value === 'number' && Number.isFinite(value)) {
      map.set(key, numberValue(value));
    } else if (typeof value === 'boolean') {
      map.set(key, boolValue(value));
    } else {
      logger.trace(`Skipping non-scalar metadata value for ${key}`);
    }
  }
  return map;
}

function toTensors(raw: ShowResponse['tensors']): TensorInfo[] {
  if (!raw) {
    return [];
  }
  return raw.map((tensor) => ({
    name: tensor.name,
    type: tensor.type,
    shape: Array.isArray(tensor.shape) ? tensor.shape : [],
  }));
}

/**
 * Build a ModelDescription from a /api/show response. Missing fields
 * become empty values.
 */
export function toModelDescription(response: ShowResponse): ModelDescription {
  const description: ModelDescription = {
    details: {
      family: response.details?.family,
      parameterSize: response.details?.parameter_size,
      quantizationLevel: response.details?.quantization_level,
    },
    modelInfo: toMetadata(response.model_info),
    projectorInfo: toMetadata(response.projector_info),
    parameters: response.parameters ?? '',
    tensors: toTensors(response.tensors),
    system: response.system ?? '',
    license: response.license ?? '',
    capabilities: response.capabilities ?? [],
  };

  logger.debug(
    `Model info: ${description.modelInfo.size} metadata keys, ` +
      `${description.tensors.length} tensors, capabilities=${description.capabilities.join(',')}`
  );

  return description;
}

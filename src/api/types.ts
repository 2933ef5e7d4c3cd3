// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Request and response shapes for the model server HTTP API.
 * Only the fields this client reads or sends are declared.
 */

export interface ShowRequest {
  model: string;
  verbose?: boolean;
}

export interface ShowResponse {
  license?: string;
  modelfile?: string;
  parameters?: string;
  template?: string;
  system?: string;
  details?: {
    parent_model?: string;
    format?: string;
    family?: string;
    families?: string[];
    parameter_size?: string;
    quantization_level?: string;
  };
  model_info?: Record<string, unknown>;
  projector_info?: Record<string, unknown>;
  tensors?: Array<{
    name: string;
    type: string;
    shape: number[];
  }>;
  capabilities?: string[];
  modified_at?: string;
}

export interface ListModelResponse {
  name: string;
  model?: string;
  modified_at: string;
  size: number;
  digest: string;
}

export interface ListResponse {
  models: ListModelResponse[];
}

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant' | 'tool';
  content: string;
}

export type ParameterValue = string | number | boolean | string[];

export interface CreateRequest {
  model: string;
  from?: string;
  adapters?: Record<string, string>;
  template?: string;
  license?: string[];
  system?: string;
  parameters?: Record<string, ParameterValue>;
  messages?: ChatMessage[];
  stream?: boolean;
}

export interface PushRequest {
  model: string;
  insecure?: boolean;
  stream?: boolean;
}

export interface DeleteRequest {
  model: string;
}

export interface GenerateRequest {
  model: string;
  prompt?: string;
  /** Seconds or a duration string; 0 unloads the model */
  keep_alive?: number | string;
  stream?: boolean;
}

export interface GenerateResponse {
  model?: string;
  response?: string;
  done: boolean;
  done_reason?: string;
}

/**
 * One line of a streamed create/push response.
 */
export interface ProgressResponse {
  status?: string;
  digest?: string;
  total?: number;
  completed?: number;
  error?: string;
}

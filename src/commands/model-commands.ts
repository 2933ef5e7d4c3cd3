// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Model commands: show, list, create, save, push and delete.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import chalk from 'chalk';
import type { ApiClient } from '../api/client.js';
import type { ChatMessage, CreateRequest, ParameterValue } from '../api/types.js';
import { toModelDescription } from '../api/model-info.js';
import { ApiError, LmctlError, ErrorCategory, ModelfileNotFoundError, errorMessage } from '../errors.js';
import { logger } from '../logger.js';
import { parseModelfile, toCreateRequest } from '../modelfile/parser.js';
import { writeTo, type OutputSink } from '../output/sink.js';
import { formatBytes, formatRelativeTime } from '../show/format.js';
import { renderModelInfo } from '../show/renderer.js';
import { formatTable } from '../show/table.js';
import { spinner } from '../spinner.js';

export const DEFAULT_MODELFILE = 'Modelfile';

/** Characters of the digest shown in the ID column. */
const ID_LENGTH = 12;

const NAME_PART = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;
const TAG_PART = /^[A-Za-z0-9_][A-Za-z0-9._-]{0,127}$/;

/**
 * Whether `name` has the shape `[host/][namespace/]model[:tag]`.
 * File paths such as `/etc/passwd` or `C:\models\x` are rejected.
 */
export function isValidModelName(name: string): boolean {
  if (!name) return false;

  const slash = name.lastIndexOf('/');
  const colon = name.lastIndexOf(':');
  let base = name;
  if (colon > slash) {
    if (!TAG_PART.test(name.slice(colon + 1))) return false;
    base = name.slice(0, colon);
  }

  const parts = base.split('/');
  if (parts.length > 3) return false;
  return parts.every((part) => NAME_PART.test(part));
}

// ============================================
// show
// ============================================

export interface ShowOptions {
  verbose?: boolean;
}

export async function showHandler(client: ApiClient, name: string, options: ShowOptions, sink: OutputSink): Promise<void> {
  const verbose = options.verbose ?? false;
  const response = await client.show({ model: name, verbose });
  renderModelInfo(toModelDescription(response), verbose, sink);
}

// ============================================
// list
// ============================================

/**
 * Print local models as a `NAME ID SIZE MODIFIED` table, optionally
 * keeping only names that start with `prefix` (case-insensitive).
 */
export async function listHandler(
  client: ApiClient,
  prefix: string | undefined,
  sink: OutputSink,
  now: Date = new Date()
): Promise<void> {
  const { models } = await client.list();
  const needle = prefix?.toLowerCase();

  const rows: string[][] = [['NAME', 'ID', 'SIZE', 'MODIFIED']];
  for (const model of models) {
    if (needle && !model.name.toLowerCase().startsWith(needle)) continue;
    rows.push([
      model.name,
      model.digest.slice(0, ID_LENGTH),
      formatBytes(model.size),
      formatRelativeTime(new Date(model.modified_at), now),
    ]);
  }
  logger.verbose(`${rows.length - 1} of ${models.length} models listed`);

  writeTo(sink, formatTable(rows, { header: true }).map((line) => line + '\n').join(''));
}

// ============================================
// delete
// ============================================

/**
 * Unload a model from memory, then delete it.
 */
export async function deleteHandler(client: ApiClient, name: string, sink: OutputSink): Promise<void> {
  try {
    await client.generate({ model: name, keep_alive: 0 });
  } catch (error) {
    throw new LmctlError(`unable to stop existing running model "${name}": ${errorMessage(error)}`, ErrorCategory.SERVER, [], {
      cause: error,
    });
  }

  await client.delete({ model: name });
  writeTo(sink, `deleted '${name}'\n`);
}

// ============================================
// push
// ============================================

export interface PushOptions {
  insecure?: boolean;
  /** Base URL shown after a successful push */
  registryUrl: string;
}

export const UNAUTHORIZED_PUSH_MESSAGE =
  'you are not authorized to push to this namespace, create the model under a namespace you own';

export async function pushHandler(client: ApiClient, name: string, options: PushOptions, sink: OutputSink): Promise<void> {
  try {
    await client.push({ model: name, insecure: options.insecure }, (progress) => spinner.progress(progress));
    spinner.succeed(chalk.green(`pushed ${name}`));
  } catch (error) {
    spinner.fail();
    if (error instanceof ApiError && error.status === 401) {
      throw new LmctlError(UNAUTHORIZED_PUSH_MESSAGE, ErrorCategory.SERVER, [], { cause: error });
    }
    throw error;
  }

  const destination = `${options.registryUrl.replace(/\/+$/, '')}/${name.replace(/:latest$/, '')}`;
  writeTo(sink, `\nYou can find your model at:\n\n\t${destination}\n`);
}

// ============================================
// create
// ============================================

/**
 * Locate the Modelfile: `file` relative to `cwd`, or `Modelfile` in `cwd`.
 * @throws ModelfileNotFoundError (code `ENOENT`) when it does not exist
 */
export async function resolveModelfilePath(file: string | undefined, cwd: string): Promise<string> {
  const resolved = path.resolve(cwd, file || DEFAULT_MODELFILE);
  try {
    await fs.access(resolved);
  } catch (error) {
    throw new ModelfileNotFoundError(resolved, { cause: error });
  }
  return resolved;
}

export interface CreateOptions {
  file?: string;
}

async function streamCreate(client: ApiClient, request: CreateRequest): Promise<void> {
  try {
    await client.create(request, (progress) => spinner.progress(progress));
    spinner.succeed(chalk.green('success'));
  } catch (error) {
    spinner.fail();
    throw error;
  }
}

export async function createHandler(client: ApiClient, name: string, options: CreateOptions, cwd: string): Promise<CreateRequest> {
  const modelfilePath = await resolveModelfilePath(options.file, cwd);
  logger.verbose(`Reading ${modelfilePath}`);

  const source = await fs.readFile(modelfilePath, 'utf-8');
  const request = toCreateRequest(name, parseModelfile(source));
  await streamCreate(client, request);
  return request;
}

// ============================================
// save
// ============================================

export interface SaveOptions {
  /** Model currently in use */
  model: string;
  /** Model it was derived from, if known */
  parentModel?: string;
  system?: string;
  parameters?: Record<string, ParameterValue>;
  messages?: ChatMessage[];
}

/**
 * Build the create request that saves a model's current settings under a
 * new name. The parent model is used as the base only when it is a valid
 * model name.
 */
export function buildSaveRequest(name: string, options: SaveOptions): CreateRequest {
  const parent = options.parentModel && isValidModelName(options.parentModel) ? options.parentModel : options.model;
  const request: CreateRequest = { model: name, from: parent || options.model };

  if (options.system) request.system = options.system;
  if (options.parameters && Object.keys(options.parameters).length > 0) request.parameters = options.parameters;
  if (options.messages && options.messages.length > 0) request.messages = options.messages;
  return request;
}

export async function saveHandler(client: ApiClient, name: string, options: SaveOptions): Promise<CreateRequest> {
  const request = buildSaveRequest(name, options);
  await streamCreate(client, request);
  return request;
}

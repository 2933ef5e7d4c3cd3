// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Modelfile parser.
 *
 * ```
 * # comment
 * FROM llama3.2
 * PARAMETER temperature 0.7
 * PARAMETER stop "<|end|>"
 * SYSTEM """
 * You are terse.
 * """
 * MESSAGE user hi
 * ```
 *
 * Instructions are case-insensitive. Values may be wrapped in `"` or
 * span several lines inside `"""`.
 */

import { ModelfileError } from '../errors.js';
import type { ChatMessage, CreateRequest, ParameterValue } from '../api/types.js';

export type Instruction = 'from' | 'parameter' | 'system' | 'template' | 'license' | 'adapter' | 'message';

const INSTRUCTIONS: readonly Instruction[] = ['from', 'parameter', 'system', 'template', 'license', 'adapter', 'message'];

const MESSAGE_ROLES = ['system', 'user', 'assistant'] as const;
type MessageRole = (typeof MESSAGE_ROLES)[number];

/** Parameters that may repeat; their values collect into an array. */
const LIST_PARAMETERS = new Set(['stop']);

const NUMBER_PATTERN = /^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/;
const TRIPLE_QUOTE = '"""';

export interface Modelfile {
  from: string;
  parameters: Record<string, ParameterValue>;
  system?: string;
  template?: string;
  license: string[];
  adapters: string[];
  messages: ChatMessage[];
}

interface Command {
  instruction: Instruction;
  args: string;
  line: number;
}

function isInstruction(value: string): value is Instruction {
  return INSTRUCTIONS.some((instruction) => instruction === value);
}

function isMessageRole(value: string): value is MessageRole {
  return MESSAGE_ROLES.some((role) => role === value);
}

/**
 * Strip one leading and one trailing newline from a `"""` block.
 */
function trimBlock(text: string): string {
  return text.replace(/^\r?\n/, '').replace(/\r?\n$/, '');
}

function unquote(value: string): string {
  if (value.length >= 2 && value.startsWith('"') && value.endsWith('"')) {
    return value.slice(1, -1);
  }
  return value;
}

/**
 * Split the source into commands, joining `"""` blocks.
 */
function tokenize(source: string): Command[] {
  const lines = source.split('\n');
  const commands: Command[] = [];

  for (let i = 0; i < lines.length; i++) {
    const lineNumber = i + 1;
    const raw = lines[i].replace(/\r$/, '');
    const text = raw.trim();
    if (!text || text.startsWith('#')) continue;

    const match = /^(\S+)\s*([\s\S]*)$/.exec(text);
    if (!match) continue;

    const name = match[1].toLowerCase();
    if (!isInstruction(name)) {
      throw new ModelfileError(`unknown instruction "${match[1]}"`, lineNumber);
    }

    let args = match[2];
    const open = args.indexOf(TRIPLE_QUOTE);
    if (open >= 0) {
      const prefix = args.slice(0, open);
      let body = args.slice(open + TRIPLE_QUOTE.length);
      let close = body.indexOf(TRIPLE_QUOTE);
      while (close < 0) {
        i++;
        if (i >= lines.length) {
          throw new ModelfileError('unterminated multi-line string', lineNumber);
        }
        body += '\n' + lines[i].replace(/\r$/, '');
        close = body.indexOf(TRIPLE_QUOTE);
      }
      args = prefix + trimBlock(body.slice(0, close));
    } else {
      args = unquote(args.trim());
    }

    commands.push({ instruction: name, args, line: lineNumber });
  }

  return commands;
}

/**
 * Convert a parameter value: numbers and `true`/`false` become typed values.
 */
export function parseParameterValue(raw: string): string | number | boolean {
  const value = unquote(raw.trim());
  if (value === 'true') return true;
  if (value === 'false') return false;
  if (NUMBER_PATTERN.test(value)) return Number(value);
  return value;
}

function addParameter(parameters: Record<string, ParameterValue>, command: Command): void {
  const match = /^(\S+)\s+([\s\S]+)$/.exec(command.args);
  if (!match) {
    throw new ModelfileError('PARAMETER requires a name and a value', command.line);
  }
  const key = match[1].toLowerCase();

  if (LIST_PARAMETERS.has(key)) {
    const existing = parameters[key];
    const values = Array.isArray(existing) ? existing : [];
    parameters[key] = [...values, unquote(match[2].trim())];
    return;
  }
  parameters[key] = parseParameterValue(match[2]);
}

function parseMessage(command: Command): ChatMessage {
  const match = /^(\S+)\s+([\s\S]+)$/.exec(command.args);
  if (!match) {
    throw new ModelfileError('MESSAGE requires a role and content', command.line);
  }
  const role = match[1].toLowerCase();
  if (!isMessageRole(role)) {
    throw new ModelfileError(`invalid message role "${match[1]}", expected one of ${MESSAGE_ROLES.join(', ')}`, command.line);
  }
  return { role, content: unquote(match[2].trim()) };
}

/**
 * Parse Modelfile source text.
 * @throws ModelfileError on unknown instructions, malformed arguments or a missing FROM
 */
export function parseModelfile(source: string): Modelfile {
  let from: string | undefined;
  const modelfile: Omit<Modelfile, 'from'> = {
    parameters: {},
    license: [],
    adapters: [],
    messages: [],
  };

  for (const command of tokenize(source)) {
    if (!command.args && command.instruction !== 'system' && command.instruction !== 'template') {
      throw new ModelfileError(`${command.instruction.toUpperCase()} requires a value`, command.line);
    }

    switch (command.instruction) {
      case 'from':
        from = command.args;
        break;
      case 'parameter':
        addParameter(modelfile.parameters, command);
        break;
      case 'system':
        modelfile.system = command.args;
        break;
      case 'template':
        modelfile.template = command.args;
        break;
      case 'license':
        modelfile.license.push(command.args);
        break;
      case 'adapter':
        modelfile.adapters.push(command.args);
        break;
      case 'message':
        modelfile.messages.push(parseMessage(command));
        break;
    }
  }

  if (from === undefined) {
    throw new ModelfileError('no FROM line');
  }
  return { from, ...modelfile };
}

/**
 * Build the create request for a parsed Modelfile. Empty sections are left out.
 */
export function toCreateRequest(model: string, modelfile: Modelfile): CreateRequest {
  const request: CreateRequest = { model, from: modelfile.from };

  if (Object.keys(modelfile.parameters).length > 0) request.parameters = modelfile.parameters;
  if (modelfile.system !== undefined) request.system = modelfile.system;
  if (modelfile.template !== undefined) request.template = modelfile.template;
  if (modelfile.license.length > 0) request.license = modelfile.license;
  if (modelfile.messages.length > 0) request.messages = modelfile.messages;
  if (modelfile.adapters.length > 0) {
    request.adapters = Object.fromEntries(modelfile.adapters.map((adapter) => [adapter, adapter]));
  }
  return request;
}

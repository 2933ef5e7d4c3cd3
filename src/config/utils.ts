// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Configuration Utilities
 */

export const DEFAULT_HOST = '127.0.0.1';
export const DEFAULT_PORT = '11434';

const PORT_PATTERN = /^\d{1,5}$/;

function defaultServerUrl(): string {
  return `http://${DEFAULT_HOST}:${DEFAULT_PORT}`;
}

/**
 * Normalize a server address into a base URL.
 *
 * - No scheme: `http` with port 11434 when the port is missing.
 * - `http://` / `https://` without a port: 80 / 443.
 * - Empty host: 127.0.0.1. Unparseable port: the default server URL.
 *
 * @example normalizeHost('localhost') // "http://localhost:11434"
 */
export function normalizeHost(raw: string | undefined): string {
  const value = (raw ?? '').trim();
  if (!value) {
    return defaultServerUrl();
  }

  let scheme = 'http';
  let defaultPort = DEFAULT_PORT;
  let rest = value;
  const schemeEnd = value.indexOf('://');
  if (schemeEnd >= 0) {
    scheme = value.slice(0, schemeEnd);
    rest = value.slice(schemeEnd + 3);
    if (scheme === 'http') defaultPort = '80';
    if (scheme === 'https') defaultPort = '443';
  }

  const slash = rest.indexOf('/');
  const hostPort = slash >= 0 ? rest.slice(0, slash) : rest;
  const path = slash >= 0 ? rest.slice(slash).replace(/\/+$/, '') : '';

  let host: string;
  let port: string;
  const bracketed = /^\[([^\]]+)\](?::(.*))?$/.exec(hostPort);
  if (bracketed) {
    host = `[${bracketed[1]}]`;
    port = bracketed[2] ?? '';
  } else if (hostPort.split(':').length > 2) {
    // Bare IPv6 address
    host = `[${hostPort}]`;
    port = '';
  } else {
    const colon = hostPort.indexOf(':');
    host = colon >= 0 ? hostPort.slice(0, colon) : hostPort;
    port = colon >= 0 ? hostPort.slice(colon + 1) : '';
  }

  if (!host) host = DEFAULT_HOST;
  if (!port) port = defaultPort;
  if (!PORT_PATTERN.test(port) || Number(port) > 65535) {
    return defaultServerUrl();
  }

  return `${scheme}://${host}:${port}${path}`;
}

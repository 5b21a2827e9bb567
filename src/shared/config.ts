/**
 * Centralized Configuration
 *
 * All configuration values loaded from environment variables with sensible defaults.
 * This prevents hardcoded values scattered throughout the codebase.
 */

import * as path from 'path';
import { fileURLToPath } from 'url';
import { config as loadDotenv } from 'dotenv';
import { MAX_ID_WIDTH, MIN_ID_WIDTH, isValidIdWidth } from './utils/random-id.js';

// Load .env file
loadDotenv();

export const TRANSPORT_KINDS = [
  'oneshot-process',
  'persistent-process',
  'http',
  'websocket',
  'in-process',
] as const;

export type TransportKind = (typeof TRANSPORT_KINDS)[number];

export const TRANSFORM_SIDES = ['client', 'engine'] as const;

export type TransformSide = (typeof TRANSFORM_SIDES)[number];

const TRANSPORT_KIND_NAMES: readonly string[] = TRANSPORT_KINDS;
const TRANSFORM_SIDE_NAMES: readonly string[] = TRANSFORM_SIDES;

function isTransportKind(value: string): value is TransportKind {
  return TRANSPORT_KIND_NAMES.includes(value);
}

function isTransformSide(value: string): value is TransformSide {
  return TRANSFORM_SIDE_NAMES.includes(value);
}

/**
 * Layout Transport Configuration
 */
const RAW_LAYOUT_TRANSPORT = process.env.LAYOUT_TRANSPORT || 'in-process';
const RAW_LAYOUT_TRANSFORM_SIDE = process.env.LAYOUT_TRANSFORM_SIDE || 'client';

export const LAYOUT_TRANSPORT: TransportKind = isTransportKind(RAW_LAYOUT_TRANSPORT)
  ? RAW_LAYOUT_TRANSPORT
  : 'in-process';
export const LAYOUT_TRANSFORM_SIDE: TransformSide = isTransformSide(RAW_LAYOUT_TRANSFORM_SIDE)
  ? RAW_LAYOUT_TRANSFORM_SIDE
  : 'client';
export const LAYOUT_TIMEOUT_MS = parseInt(process.env.LAYOUT_TIMEOUT_MS || '30000', 10);

/**
 * Engine Configuration
 * The default script is the compiled CLI next to this module (dist/engine/cli.js)
 */
const __dirname = path.dirname(fileURLToPath(import.meta.url));
export const ELK_ENGINE_COMMAND = process.env.ELK_ENGINE_COMMAND || process.execPath;
export const ELK_ENGINE_SCRIPT =
  process.env.ELK_ENGINE_SCRIPT || path.join(__dirname, '..', 'engine', 'cli.js');
export const ELK_SERVER_PORT = parseInt(process.env.ELK_SERVER_PORT || '3000', 10);
export const ELK_ENGINE_URL = process.env.ELK_ENGINE_URL || `http://localhost:${ELK_SERVER_PORT}`;
export const ELK_ENGINE_WS_URL = process.env.ELK_ENGINE_WS_URL || `ws://localhost:${ELK_SERVER_PORT}`;

/**
 * Scene Configuration
 */
export const GENERATED_ID_WIDTH = parseInt(process.env.GENERATED_ID_WIDTH || '6', 10);

/**
 * Logging
 * Use /tmp explicitly so the engine process and its callers share one file
 */
const TMP_DIR = process.env.TMP_DIR || '/tmp';
export const LOG_PATH = process.env.LOG_PATH || path.join(TMP_DIR, 'elk-scene-bridge.log');
export const LOG_LEVEL = (process.env.LOG_LEVEL || 'INFO').toUpperCase();
export const SUPPRESS_TEST_LOGS = process.env.NODE_ENV === 'test' || process.env.VITEST === 'true';

/**
 * Application Configuration
 */
export const NODE_ENV = process.env.NODE_ENV || 'development';

function isValidUrl(value: string, protocols: string[]): boolean {
  try {
    return protocols.includes(new URL(value).protocol);
  } catch {
    return false;
  }
}

/**
 * Validate environment variables
 */
export function validateConfig(): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  if (!isTransportKind(RAW_LAYOUT_TRANSPORT)) {
    errors.push(
      `LAYOUT_TRANSPORT must be one of ${TRANSPORT_KINDS.join(', ')}, got '${RAW_LAYOUT_TRANSPORT}'`
    );
  }

  if (!isTransformSide(RAW_LAYOUT_TRANSFORM_SIDE)) {
    errors.push(
      `LAYOUT_TRANSFORM_SIDE must be 'client' or 'engine', got '${RAW_LAYOUT_TRANSFORM_SIDE}'`
    );
  }

  if (!Number.isFinite(LAYOUT_TIMEOUT_MS) || LAYOUT_TIMEOUT_MS <= 0) {
    errors.push(`LAYOUT_TIMEOUT_MS must be > 0, got ${process.env.LAYOUT_TIMEOUT_MS}`);
  }

  if (!Number.isInteger(ELK_SERVER_PORT) || ELK_SERVER_PORT < 1 || ELK_SERVER_PORT > 65535) {
    errors.push(`ELK_SERVER_PORT must be between 1 and 65535, got ${process.env.ELK_SERVER_PORT}`);
  }

  if (LAYOUT_TRANSPORT === 'http' && !isValidUrl(ELK_ENGINE_URL, ['http:', 'https:'])) {
    errors.push(`ELK_ENGINE_URL must be an http(s) URL, got '${ELK_ENGINE_URL}'`);
  }

  if (LAYOUT_TRANSPORT === 'websocket' && !isValidUrl(ELK_ENGINE_WS_URL, ['ws:', 'wss:'])) {
    errors.push(`ELK_ENGINE_WS_URL must be a ws(s) URL, got '${ELK_ENGINE_WS_URL}'`);
  }

  if (!isValidIdWidth(GENERATED_ID_WIDTH)) {
    errors.push(`GENERATED_ID_WIDTH must be between ${MIN_ID_WIDTH} and ${MAX_ID_WIDTH}, got ${process.env.GENERATED_ID_WIDTH}`);
  }

  return {
    valid: errors.length === 0,
    errors
  };
}

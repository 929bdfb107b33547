/**
 * Fleetwire Kernel: Module Argument Codec
 *
 * Arguments reach a module through exactly one environment variable. The
 * channel writes base64-encoded UTF-8 JSON so arbitrary values survive any
 * shell or command-line length limit.
 *
 * Accepted payload forms, in the order they are tried:
 *
 *   1. absent or blank             → {}
 *   2. text starting with `{`       → raw JSON (tools that bypass the encoder)
 *   3. anything else               → base64, then JSON
 *
 * A payload that fails every form, or decodes to something other than a JSON
 * object, degrades to {} and the failure is returned as a DecodeError value.
 * This is the only place in Fleetwire where a decode failure is not raised.
 */

import { Buffer } from 'node:buffer';
import { DecodeError } from '../errors.js';
import { isJsonObject, tryParseJson, type JsonObject } from '../types/json.js';

/** Fixed default name of the argument variable. Overridable via configuration. */
export const DEFAULT_ARGS_ENV_VAR = 'ANSIBLE_MODULE_ARGS';

const BASE64_PATTERN = /^[A-Za-z0-9+/\-_]*={0,2}$/;

export interface DecodedModuleArgs {
  readonly args: JsonObject;
  /** Set when the payload was present but unusable. `args` is then `{}`. */
  readonly error: DecodeError | null;
}

/** Serialize arguments to JSON and base64-encode the UTF-8 bytes. */
export function encodeModuleArgs(args: JsonObject): string {
  return Buffer.from(JSON.stringify(args), 'utf-8').toString('base64');
}

/** Decode an argument payload. Never throws. */
export function decodeModuleArgs(raw: string | undefined): DecodedModuleArgs {
  if (raw === undefined) return { args: {}, error: null };
  const text = raw.trim();
  if (text === '') return { args: {}, error: null };

  if (text.startsWith('{')) {
    return fromJsonText(text, raw, 'raw JSON');
  }

  const compact = text.replace(/\s+/g, '');
  if (!BASE64_PATTERN.test(compact)) {
    return degrade(raw, 'payload is neither JSON nor base64');
  }
  const decoded = Buffer.from(compact, 'base64').toString('utf-8');
  return fromJsonText(decoded, raw, 'base64 payload');
}

/**
 * Read and decode the argument variable from an environment.
 *
 * This is the module-side half of the contract; a module implemented in
 * TypeScript calls `readModuleArgs(process.env)` at startup.
 */
export function readModuleArgs(
  env: Readonly<Record<string, string | undefined>>,
  varName: string = DEFAULT_ARGS_ENV_VAR,
): DecodedModuleArgs {
  return decodeModuleArgs(env[varName]);
}

function fromJsonText(text: string, raw: string, form: string): DecodedModuleArgs {
  const parsed = tryParseJson(text);
  if (parsed === undefined) {
    return degrade(raw, `${form} is not valid JSON`);
  }
  if (!isJsonObject(parsed)) {
    return degrade(raw, `${form} is not a JSON object`);
  }
  return { args: parsed, error: null };
}

function degrade(raw: string, reason: string): DecodedModuleArgs {
  return { args: {}, error: new DecodeError(`Module arguments could not be decoded: ${reason}`, raw) };
}

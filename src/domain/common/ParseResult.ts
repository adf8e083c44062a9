import { OracleParseError } from './Errors';

/**
 * Outcome of interpreting oracle output. A fallback still carries a usable
 * value (the safe default) together with the reason it was chosen.
 */
export type ParseResult<T> =
  | { kind: 'ok'; value: T }
  | { kind: 'fallback'; value: T; reason: OracleParseError };

export function ok<T>(value: T): ParseResult<T> {
  return { kind: 'ok', value };
}

export function fallback<T>(value: T, reason: OracleParseError): ParseResult<T> {
  return { kind: 'fallback', value, reason };
}

/**
 * Coercion of application values into wire-ready metric values.
 */

import { TextDecoder } from 'util';
import type { MetricScalar } from './datum.js';

export type MetricSource = string | number | bigint | boolean | Uint8Array;

export interface MetricValue {
  readonly key: string;
  readonly value: MetricScalar;
}

const utf8 = new TextDecoder('utf-8');

function coerce(value: MetricSource): MetricScalar {
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return value;
    case 'number':
      // JSON has no NaN or Infinity
      return Number.isFinite(value) ? value : String(value);
    case 'bigint':
      return Number(value);
    default:
      // Assumed to be UTF-8 text. Don't send binary.
      return utf8.decode(value);
  }
}

export function metric(key: string, value: MetricSource): MetricValue {
  return Object.freeze({ key, value: coerce(value) });
}

/**
 * Name of the service this span and its children belong to. Exported as
 * `service_name`.
 */
export function service(name: string): MetricValue {
  return metric('service_name', name);
}

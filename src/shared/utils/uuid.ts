/**
 * UUID Utility
 * Time-ordered uuidv7 ids for sessions and connections
 */

import { v7 as uuidv7, validate, version } from 'uuid';

export function generateId(): string {
  return uuidv7();
}

/**
 * True when the value is a well-formed uuid v7 (the only kind this service issues)
 */
export function isGeneratedId(value: string): boolean {
  return validate(value) && version(value) === 7;
}

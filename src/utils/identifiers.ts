/**
 * STIX identifier helpers.
 */

import { v4 as uuidv4 } from 'uuid';

/** Returns a fresh unique string on every call. */
export type IdGenerator = () => string;

export const randomIdGenerator: IdGenerator = () => uuidv4();

/**
 * Build a STIX identifier of the form `<type>--<suffix>`.
 *
 * @example stixId('threat-actor', '7cdff317-a673-4474-84ec-4f1754947823')
 *   => 'threat-actor--7cdff317-a673-4474-84ec-4f1754947823'
 */
export function stixId(type: string, suffix: string): string {
  return `${type}--${suffix}`;
}

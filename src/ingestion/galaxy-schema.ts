/**
 * Zod schema for the top level of a MISP galaxy cluster file.
 *
 * Only the envelope is checked here. Individual clusters in `values` stay
 * `unknown` so one bad cluster cannot reject the whole file. Header
 * fields of the wrong type are dropped rather than rejected.
 */

import { z } from 'zod';

export const MispGalaxyDocumentSchema = z
  .object({
    name: z.string().optional().catch(undefined),
    type: z.string().optional().catch(undefined),
    uuid: z.string().optional().catch(undefined),
    version: z.number().optional().catch(undefined),
    source: z.string().optional().catch(undefined),
    authors: z.array(z.string()).optional().catch(undefined),
    description: z.string().optional().catch(undefined),
    values: z.array(z.unknown(), {
      required_error: "Missing 'values' key",
      invalid_type_error: "'values' must be a list",
    }),
  })
  .passthrough();

/**
 * @fileoverview zod schemas for values that cross a trust boundary:
 * the persisted side table and caller-supplied metadata.
 */

import { z } from 'zod';
import type { JsonValue } from '../../types/base.js';

export const jsonValue: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(jsonValue), z.record(jsonValue)])
);

export const docMeta = z.record(jsonValue);

/** Contents of `<name>_metadata.json`, in insertion order */
export const sideTable = z.object({
  documents: z.array(z.string()),
  metadata: z.array(docMeta),
});

export type SideTable = z.infer<typeof sideTable>;

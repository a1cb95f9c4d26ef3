/**
 * Boundary schemas for the graphdata payload.
 *
 * Only containers are validated here. Individual points are inspected one by
 * one by the extractor so a single bad element never rejects a whole series.
 */

import { z } from 'zod';

export const documentSchema = z.record(z.string(), z.unknown());

export const seriesContainerSchema = z
  .object({
    data: z.array(z.unknown()),
  })
  .passthrough();

export const currentContainerSchema = z.record(z.string(), z.unknown());

export type GraphDocument = z.infer<typeof documentSchema>;

/** Short, log-safe rendering of an unknown value */
export function describeValue(value: unknown, max = 200): string {
  let text: string;
  try {
    text = JSON.stringify(value) ?? String(value);
  } catch {
    text = String(value);
  }
  return text.length > max ? `${text.slice(0, max)}…` : text;
}

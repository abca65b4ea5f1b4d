import { z } from 'zod';

// ── State list entry ────────────────────────────────────────

export const stateEntrySchema = z.object({
  Id: z.union([z.number().int(), z.string().min(1)]),
  StateName: z.string().optional(),
});

export type StateEntry = z.infer<typeof stateEntrySchema>;

export const stateListSchema = z.array(stateEntrySchema);

/** A state ready to be queried: id as sent to FIRST, name safe for a file name. */
export interface ReportState {
  id: string;
  name: string;
}

export function toReportState(entry: StateEntry): ReportState {
  return {
    id: String(entry.Id),
    name: (entry.StateName ?? 'unknown').replaceAll('/', '-'),
  };
}

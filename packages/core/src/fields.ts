import { SYNC_RELEVANT_FIELDS, type RecordEdit, type RecordFields, type NewRecordInput } from "./types.js";

export const DEFAULT_STATUS = "Open";

/**
 * Upper-case the first character and lower-case the rest ("in progress" → "In progress").
 * The remote endpoint is case-sensitive about status values.
 */
export function capitalizeStatus(status: string | undefined | null): string {
  const value = status || DEFAULT_STATUS;
  return value.charAt(0).toUpperCase() + value.slice(1).toLowerCase();
}

/**
 * Fill defaults for a new record.
 */
export function toRecordFields(input: NewRecordInput): RecordFields {
  return {
    subject: input.subject,
    originator: input.originator ?? null,
    status: input.status || DEFAULT_STATUS,
  };
}

/**
 * True when the edit carries any field mirrored to the remote, whatever its value.
 */
export function touchesSyncedFields(edit: RecordEdit): boolean {
  return SYNC_RELEVANT_FIELDS.some((field) => edit[field] !== undefined);
}

/**
 * Keep only the sync-relevant keys that are present.
 */
export function pickEdit(edit: RecordEdit): RecordEdit {
  const picked: RecordEdit = {};
  if (edit.subject !== undefined) picked.subject = edit.subject;
  if (edit.originator !== undefined) picked.originator = edit.originator;
  if (edit.status !== undefined) picked.status = edit.status;
  return picked;
}

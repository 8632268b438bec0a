import { randomBytes } from "node:crypto";

/**
 * Generate a unique run ID, e.g. `out_1718000000000_1a2b3c4d`.
 */
export function generateRunId(prefix: string): string {
  return `${prefix}_${Date.now()}_${randomBytes(4).toString("hex")}`;
}

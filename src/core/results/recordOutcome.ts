import type { RecordOutcome } from "../bulk/bulk.types";

export const requiredResultFields = ["Success", "Created", "Id", "Error"] as const;
type ResultField = (typeof requiredResultFields)[number];

export type ResultHeader = Record<ResultField, number>;

export const MISSING_ERROR_MESSAGE = "Record failed without an error message";
export const MISSING_ID_MESSAGE = "Record reported as created without an identifier";

/**
 * Resolves the column position of every required result field.
 * Returns the names of the missing fields when the header is incomplete.
 */
export const resolveResultHeader = (
  names: readonly string[]
): { ok: true; header: ResultHeader } | { ok: false; missing: ResultField[] } => {
  const trimmed = names.map((name) => name.trim());
  const missing = requiredResultFields.filter((field) => !trimmed.includes(field));
  if (missing.length > 0) return { ok: false, missing };

  return {
    ok: true,
    header: {
      Success: trimmed.indexOf("Success"),
      Created: trimmed.indexOf("Created"),
      Id: trimmed.indexOf("Id"),
      Error: trimmed.indexOf("Error")
    }
  };
};

const parseFlag = (value: string | undefined): boolean => value?.trim().toLowerCase() === "true";

const optionalText = (value: string | undefined): string | undefined => {
  const normalized = value?.trim();
  return normalized ? normalized : undefined;
};

/**
 * Maps one result row, positionally against `header`, to a RecordOutcome.
 * - success && created -> created (must carry an id, otherwise reported failed)
 * - success && !created -> updated
 * - !success -> failed (always with a non-empty error)
 */
export const toRecordOutcome = (header: ResultHeader, fields: readonly string[], row: number): RecordOutcome => {
  const success = parseFlag(fields[header.Success]);
  const created = parseFlag(fields[header.Created]);
  const id = optionalText(fields[header.Id]);
  const error = optionalText(fields[header.Error]);

  if (!success) {
    return { row, status: "failed", success, created, id, error: error ?? MISSING_ERROR_MESSAGE };
  }

  if (created && id === undefined) {
    return { row, status: "failed", success: false, created, error: MISSING_ID_MESSAGE };
  }

  return { row, status: created ? "created" : "updated", success, created, id };
};

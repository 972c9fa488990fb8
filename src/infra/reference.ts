import { randomBytes } from "node:crypto";

function pad(value: number, width: number): string {
  return String(value).padStart(width, "0");
}

// yyyyMMddHHmmssSSS in UTC
function compactTimestamp(date: Date): string {
  return [
    pad(date.getUTCFullYear(), 4),
    pad(date.getUTCMonth() + 1, 2),
    pad(date.getUTCDate(), 2),
    pad(date.getUTCHours(), 2),
    pad(date.getUTCMinutes(), 2),
    pad(date.getUTCSeconds(), 2),
    pad(date.getUTCMilliseconds(), 3),
  ].join("");
}

export interface ExternalReferenceInput {
  operator: string;
  payerId: number;
  contextId: number;
  timestampMs: number;
}

export type ReferenceSuffixSource = () => string;

export const randomReferenceSuffix: ReferenceSuffixSource = () => randomBytes(3).toString("hex");

export function generateExternalReference(
  input: ExternalReferenceInput,
  suffix: ReferenceSuffixSource = randomReferenceSuffix,
): string {
  const operatorTag = input.operator.toUpperCase().replace(/[^A-Z0-9]/g, "");
  return `${operatorTag}_${input.payerId}_${input.contextId}_${compactTimestamp(new Date(input.timestampMs))}_${suffix()}`;
}

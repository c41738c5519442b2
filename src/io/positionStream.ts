import { FormatError, toGeodesyError } from "../core/errors";
import { parsePositionRecord } from "../core/schema";
import type { PositionRecord } from "../core/schema";

const messageOf = (error: unknown): string => toGeodesyError(error).message;

export const parseNdjsonPositions = (raw: string): PositionRecord[] =>
  raw
    .split("\n")
    .map((line) => line.trim())
    .filter(Boolean)
    .map((line, index) => {
      try {
        const parsed: unknown = JSON.parse(line);
        return parsePositionRecord(parsed);
      } catch (error) {
        throw new FormatError(`Invalid NDJSON position at line ${index + 1}: ${messageOf(error)}`, line);
      }
    });

export const parseJsonPositions = (raw: string): PositionRecord[] => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new FormatError(`Invalid JSON: ${messageOf(error)}`);
  }
  if (!Array.isArray(parsed)) {
    throw new FormatError("Expected JSON array of positions");
  }
  return parsed.map((item: unknown, index) => parsePositionRecord(item, `positions[${index}]`));
};

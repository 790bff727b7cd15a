import { InvalidParameterError } from "../errors";
import { SpeakerRoles } from "../types";

export function parseRoles(value: string): SpeakerRoles {
  const roles = value
    .split(",")
    .map((role) => role.trim())
    .filter((role) => role.length > 0);
  if (roles.length !== 2) {
    throw new InvalidParameterError(`Expected two comma-separated speaker roles, got "${value}".`);
  }
  return [roles[0], roles[1]];
}

export function previewLines(content: string, count: number): string {
  const lines = content.split("\n");
  if (lines.length <= count) {
    return content.trimEnd();
  }
  return [...lines.slice(0, count), "..."].join("\n");
}

import { InvalidArgumentError } from "commander";

export function parseIntOption(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || String(parsed) !== value.trim()) {
    throw new InvalidArgumentError(`Expected an integer, got: ${value}`);
  }
  return parsed;
}

export function parsePositiveIntOption(value: string): number {
  const parsed = parseIntOption(value);
  if (parsed < 1) {
    throw new InvalidArgumentError(`Expected a positive integer, got: ${value}`);
  }
  return parsed;
}

export function parsePortOption(value: string): number {
  const parsed = parseIntOption(value);
  if (parsed < 1 || parsed > 65535) {
    throw new InvalidArgumentError(`Expected a port between 1 and 65535, got: ${value}`);
  }
  return parsed;
}

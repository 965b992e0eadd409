import type { ToolArguments } from "../models/tool.js";

export function normalize(text: string): string {
  return text
    .toLowerCase()
    .normalize("NFD") // split accents from letters
    .replace(/[\u0300-\u036f]/g, "") // drop the accents
    .replace(/\s+/g, " ")
    .trim();
}

/** Reads a required, non-blank string argument. */
export function requireString(args: ToolArguments, key: string): string {
  const value = args[key];
  if (typeof value !== "string" || !value.trim()) {
    throw new Error(`argument "${key}" must be a non-empty string`);
  }
  return value.trim();
}

/** Reads an optional positive integer; numeric strings are accepted too. */
export function optionalPositiveInt(args: ToolArguments, key: string, fallback: number): number {
  const value = args[key];
  if (value === undefined || value === null) return fallback;
  const n = typeof value === "string" ? Number(value) : value;
  if (typeof n !== "number" || !Number.isInteger(n) || n < 1) {
    throw new Error(`argument "${key}" must be a positive integer`);
  }
  return n;
}

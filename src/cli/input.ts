import fs from "fs";
import { InvalidArgumentError } from "commander";

export interface TextSource {
  text?: string;
  file?: string;
}

export async function readInputText(source: TextSource, stdin: NodeJS.ReadableStream = process.stdin): Promise<string> {
  if (source.text !== undefined) {
    return source.text;
  }
  if (source.file) {
    return fs.promises.readFile(source.file, "utf8");
  }
  const chunks: Buffer[] = [];
  for await (const chunk of stdin) {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk, "utf8") : chunk);
  }
  return Buffer.concat(chunks).toString("utf8");
}

export function parseIntegerOption(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}

export function parseNumberOption(value: string): number {
  const parsed = Number(value);
  if (value.trim() === "" || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError("Expected a number.");
  }
  return parsed;
}

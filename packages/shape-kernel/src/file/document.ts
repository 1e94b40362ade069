import { readFileSync, writeFileSync } from "node:fs";
import { DocumentIOError } from "../errors.js";

export interface DocumentSink {
  write(text: string): void;
}

export interface DocumentSource {
  read(): string;
}

export const DOCUMENT_EXTENSION = ".json";

/** Appends `.json` unless the name already ends with it (any case). */
export function withDocumentExtension(path: string): string {
  return path.toLowerCase().endsWith(DOCUMENT_EXTENSION) ? path : `${path}${DOCUMENT_EXTENSION}`;
}

/** Synchronous file-backed document; blocks the caller for the duration. */
export class FileDocument implements DocumentSink, DocumentSource {
  constructor(readonly path: string) {}

  read(): string {
    try {
      return readFileSync(this.path, "utf8");
    } catch (error) {
      throw new DocumentIOError("READ_FAILED", `Cannot read ${this.path}`, { cause: error });
    }
  }

  write(text: string): void {
    try {
      writeFileSync(this.path, text, "utf8");
    } catch (error) {
      throw new DocumentIOError("WRITE_FAILED", `Cannot write ${this.path}`, { cause: error });
    }
  }
}

export class MemoryDocument implements DocumentSink, DocumentSource {
  constructor(private text: string | null = null) {}

  get contents(): string | null {
    return this.text;
  }

  read(): string {
    if (this.text === null) {
      throw new DocumentIOError("READ_FAILED", "Memory document is empty");
    }
    return this.text;
  }

  write(text: string): void {
    this.text = text;
  }
}

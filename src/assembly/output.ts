/**
 * Document sinks. The generator hands every finished document to a sink
 * by file name; the sink decides where the text ends up.
 */

import { mkdirSync, writeFileSync } from "node:fs";
import { join, resolve } from "node:path";

export interface DocumentSink {
  /** Store `content` under `fileName`, replacing earlier content. */
  write(fileName: string, content: string): void;
}

/**
 * Writes documents into a directory, creating it on first write.
 */
export class FileSystemSink implements DocumentSink {
  readonly outputDir: string;
  private prepared = false;

  constructor(outputDir: string) {
    this.outputDir = resolve(outputDir);
  }

  pathFor(fileName: string): string {
    return join(this.outputDir, fileName);
  }

  write(fileName: string, content: string): void {
    if (!this.prepared) {
      mkdirSync(this.outputDir, { recursive: true });
      this.prepared = true;
    }
    writeFileSync(this.pathFor(fileName), content, "utf-8");
  }
}

/**
 * Keeps documents in memory. Used for check runs, which assemble every
 * document without touching the filesystem.
 */
export class MemorySink implements DocumentSink {
  private readonly documents = new Map<string, string>();

  write(fileName: string, content: string): void {
    this.documents.set(fileName, content);
  }

  read(fileName: string): string | undefined {
    return this.documents.get(fileName);
  }

  /** File names in write order. */
  fileNames(): string[] {
    return [...this.documents.keys()];
  }
}

import { promises as fsp } from "node:fs";
import path from "node:path";
import type { Readable, Writable } from "node:stream";
import { logger } from "../logger";
import { isMissingFileError } from "./artifact";

const DEFAULT_MAX_BYTES = 1024 * 1024;

export interface StderrLogOptions {
  /**
   * Upper bound on the file size. Appends that cross it cut the file back
   * to its trailing half; `prepare()` cuts an older file back to the bound.
   */
  maxBytes?: number;
}

/**
 * Append-only capture of the supervised process's stderr, kept bounded so
 * the breaker can attach its tail to the error artifact.
 */
export class StderrLog {
  private readonly maxBytes: number;
  private pending: Promise<void> = Promise.resolve();
  /** Bytes on disk as far as this instance knows; null until measured. */
  private size: number | null = null;

  constructor(
    readonly filePath: string,
    options: StderrLogOptions = {},
  ) {
    this.maxBytes = options.maxBytes ?? DEFAULT_MAX_BYTES;
  }

  async prepare(): Promise<void> {
    await fsp.mkdir(path.dirname(this.filePath), { recursive: true });
    const size = await this.measure();
    this.size = size > this.maxBytes ? await this.trimTo(this.maxBytes) : size;
  }

  append(chunk: string | Buffer): void {
    this.pending = this.pending
      .then(() => this.write(chunk))
      .catch((err: unknown) => {
        logger.warn({ err, file: this.filePath }, "Failed to append to stderr log");
      });
  }

  /** Copies everything `stream` emits into the log and, optionally, `mirror`. */
  attach(stream: Readable, mirror?: Writable): void {
    stream.on("data", (chunk: string | Buffer) => {
      this.append(chunk);
      mirror?.write(chunk);
    });
  }

  async flush(): Promise<void> {
    await this.pending;
  }

  /** Last `lines` lines, or an empty string when nothing was captured. */
  async tail(lines: number): Promise<string> {
    await this.flush();
    let content: string;
    try {
      content = await fsp.readFile(this.filePath, "utf-8");
    } catch (error) {
      if (isMissingFileError(error)) {
        return "";
      }
      throw error;
    }
    return tailLines(content, lines);
  }

  private async write(chunk: string | Buffer): Promise<void> {
    await fsp.appendFile(this.filePath, chunk);
    this.size = this.size === null ? await this.measure() : this.size + Buffer.byteLength(chunk);
    if (this.size > this.maxBytes) {
      this.size = await this.trimTo(Math.floor(this.maxBytes / 2));
    }
  }

  private async measure(): Promise<number> {
    try {
      return (await fsp.stat(this.filePath)).size;
    } catch (error) {
      if (isMissingFileError(error)) {
        return 0;
      }
      throw error;
    }
  }

  /** Keeps at most `keepBytes` trailing bytes, starting at a line boundary. */
  private async trimTo(keepBytes: number): Promise<number> {
    const content = await fsp.readFile(this.filePath);
    if (content.length <= keepBytes) {
      return content.length;
    }
    let kept = content.subarray(content.length - keepBytes);
    const firstNewline = kept.indexOf(0x0a);
    if (firstNewline >= 0) {
      kept = kept.subarray(firstNewline + 1);
    }
    await fsp.writeFile(this.filePath, kept);
    return kept.length;
  }
}

export function tailLines(content: string, lines: number): string {
  if (lines <= 0) {
    return "";
  }
  const all = content.split("\n");
  if (all.length > 0 && all[all.length - 1] === "") {
    all.pop();
  }
  return all.slice(-lines).join("\n");
}

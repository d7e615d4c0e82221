import { closeSync, mkdirSync, openSync, writeSync } from "node:fs";
import path from "node:path";

export type Sink = {
  write: (record: unknown) => void;
  close: () => void;
};

export type MemorySink = Sink & {
  readonly lines: readonly string[];
  readonly closed: boolean;
};

/**
 * Appends one compact JSON line per record. Writes are synchronous so a
 * concurrent reader sees every event even if the process dies mid-run.
 * `-` writes to stdout.
 */
export function openJsonlSink(targetPath: string): Sink {
  if (targetPath === "-" || targetPath === "") {
    return {
      write: (record: unknown) => {
        process.stdout.write(`${JSON.stringify(record)}\n`);
      },
      close: () => {},
    };
  }
  const target = path.resolve(targetPath);
  mkdirSync(path.dirname(target), { recursive: true });
  const fd = openSync(target, "a");
  return {
    write: (record: unknown) => {
      writeSync(fd, `${JSON.stringify(record)}\n`);
    },
    close: () => {
      closeSync(fd);
    },
  };
}

export function createMemorySink(): MemorySink {
  const lines: string[] = [];
  let closed = false;
  return {
    lines,
    get closed() {
      return closed;
    },
    write: (record: unknown) => {
      if (closed) throw new Error("sink is closed");
      lines.push(JSON.stringify(record));
    },
    close: () => {
      closed = true;
    },
  };
}

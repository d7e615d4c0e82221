import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";

export async function saveTranscript(targetPath: string, output: Uint8Array): Promise<void> {
  const target = path.resolve(targetPath);
  await mkdir(path.dirname(target), { recursive: true });
  await writeFile(target, output);
}

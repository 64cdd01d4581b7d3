import { mkdir, rename, rm, writeFile } from "node:fs/promises";
import { basename, dirname, join } from "node:path";
import { ulid } from "ulid";
import { WorkerError, errorMessage } from "../errors.js";
import { encodeGraph } from "../ir/codec.js";
import type { ModuleGraph } from "../ir/types.js";

/**
 * Encode a graph and write it to `outputPath`.
 *
 * Bytes go to a temporary sibling first and are renamed into place, so the
 * output path holds either the previous file or a complete new one.
 *
 * @returns number of bytes written
 * @throws WorkerError ARTIFACT_WRITE_FAILED
 */
export async function writeArtifact(
  graph: ModuleGraph,
  outputPath: string,
): Promise<number> {
  const fail = (stage: string, error: unknown): WorkerError =>
    new WorkerError(
      "ARTIFACT_WRITE_FAILED",
      `Failed to ${stage} ${outputPath}: ${errorMessage(error)}`,
      { path: outputPath, cause: error },
    );

  let bytes: Uint8Array;
  try {
    bytes = encodeGraph(graph);
  } catch (error) {
    throw fail("encode", error);
  }

  const dir = dirname(outputPath);
  const tempPath = join(dir, `.${basename(outputPath)}.${ulid()}.tmp`);
  try {
    await mkdir(dir, { recursive: true });
    await writeFile(tempPath, bytes);
    await rename(tempPath, outputPath);
  } catch (error) {
    await rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
      console.warn(`Could not remove ${tempPath}: ${errorMessage(cleanupError)}`);
    });
    throw fail("write", error);
  }
  return bytes.length;
}

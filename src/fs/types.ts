/**
 * Read-only view of a filesystem addressed by URI.
 * Implementations: NodeFileSystem (file:), MemoryFileSystem (tests, staged
 * inputs), MultiRootFileSystem (overlay over another FileSystem).
 */
export interface FileSystem {
  exists(uri: URL): Promise<boolean>;

  /**
   * Read the whole entry.
   * @throws FileSystemError
   */
  readBytes(uri: URL): Promise<Uint8Array>;
}

const decoder = new TextDecoder("utf-8");

export async function readText(fs: FileSystem, uri: URL): Promise<string> {
  return decoder.decode(await fs.readBytes(uri));
}

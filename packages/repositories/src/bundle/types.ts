// Save bundle file system abstractions.
// Allows testing and different storage backends (filesystem, object storage, etc.)

/**
 * Abstraction for writing bundle files.
 */
export interface BundleWriter {
  /**
   * Write a file with the given content.
   * Creates parent directories as needed.
   */
  writeFile(path: string, content: string): Promise<void>;

  /**
   * Create a directory (and parents if needed).
   */
  mkdir(path: string): Promise<void>;

  /**
   * Check if a path exists.
   */
  exists(path: string): Promise<boolean>;

  /**
   * Remove a file or directory tree. Missing paths are ignored.
   */
  remove(path: string): Promise<void>;
}

/**
 * Abstraction for reading bundle files.
 */
export interface BundleReader {
  exists(path: string): Promise<boolean>;

  isDirectory(path: string): Promise<boolean>;

  /**
   * Read a file as text.
   */
  readFile(path: string): Promise<string>;

  /**
   * List entries in a directory.
   */
  listDirectory(path: string): Promise<string[]>;
}

export type BundleIO = {
  reader: BundleReader;
  writer: BundleWriter;
};

/**
 * Summary of an export operation.
 */
export type ExportSummary = {
  bundlePath: string;
  gameId: string;
  entityCount: number;
  exportedAt: string;
};

/**
 * Summary of an import operation.
 */
export type ImportSummary = {
  bundlePath: string;
  gameId: string;
  entityCount: number;
  importedAt: string;
};

/**
 * Options for export operations.
 */
export type ExportOptions = {
  /**
   * Replace an existing bundle at the same path.
   * @default false
   */
  overwrite?: boolean;
};

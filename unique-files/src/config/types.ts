/**
 * How two files are decided to be "the same"
 */
export type CompareMode = 'by-name' | 'by-content';

export type OutputFormat = 'text' | 'json';

/** Text presentation: one section per directory, or side-by-side columns */
export type OutputLayout = 'list' | 'columns';

/**
 * Configuration for a unique-files run
 */
export interface UniqueFilesConfig {
  compare: {
    /** Compare by content hash instead of filename */
    byContent: boolean;

    /** Include symlinked files as if they were regular files */
    followSymlinks: boolean;
  };

  hashing: {
    /** Digest algorithm passed to crypto.createHash */
    algorithm: string;

    /** Bytes read per chunk while hashing */
    chunkSize: number;

    /** Maximum number of files hashed at once */
    concurrency: number;
  };

  output: {
    format: OutputFormat;

    layout: OutputLayout;

    /** Entries listed per directory before "... and N more" */
    previewLimit: number;

    /** Optional file path to write output to (null = stdout) */
    outputFile: string | null;
  };
}

/**
 * Shape accepted from a configuration file; every section is optional
 */
export interface PartialUniqueFilesConfig {
  compare?: Partial<UniqueFilesConfig['compare']>;
  hashing?: Partial<UniqueFilesConfig['hashing']>;
  output?: Partial<UniqueFilesConfig['output']>;
}

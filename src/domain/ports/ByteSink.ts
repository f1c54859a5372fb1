/** Port for the destination of encoded bytes. Writes land in call order. */
export interface ByteSink {
  write(bytes: Uint8Array): Promise<void>;
  /** Resolve once every write issued so far has reached the file. */
  flush(): Promise<void>;
}

/** A sink whose bytes only become visible at `finalPath` on commit. */
export interface StagingSink extends ByteSink {
  readonly tempPath: string;
  /** Sync and atomically rename into place. */
  commit(finalPath: string): Promise<void>;
  /** Remove the staged bytes unless committed. Resolves to the cleanup error instead of rejecting. */
  discard(): Promise<Error | undefined>;
}

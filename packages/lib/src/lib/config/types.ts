export type PolycallConfig = {
  /** JSON manifest describing conversions and overloaded sets */
  manifest: string;
  /** Name of the overloaded set to call */
  set: string;
  /** JSON array of actual arguments */
  args: string;
  /** Number of times to issue the call (later calls exercise the cache) */
  repeat: number;
  /** Print cache hit/miss statistics after the calls */
  stats?: boolean;
  /** Log each resolution step to the console */
  trace?: boolean;
};

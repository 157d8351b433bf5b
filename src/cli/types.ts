export interface CreateOptions {
  output: string;
  /** Logical size in MiB */
  size: number;
}

export interface InflateOptions {
  input: string;
  output: string;
  /** Target logical size in GiB */
  target: number;
  /** Physical floor in MiB */
  minPhysical: number;
}

export interface InspectOptions {
  image: string;
}

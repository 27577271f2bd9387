/**
 * Represents an S3 object with metadata
 */
export interface S3Object {
  /** S3 object key */
  key: string;

  /** Last modified timestamp */
  lastModified: Date;

  /** Size of the object in bytes */
  size: number;
}

/**
 * One page of a listing
 */
export interface S3ObjectPage {
  objects: S3Object[];

  /** Token for the next page; absent on the last page */
  nextContinuationToken?: string;
}

/**
 * Interface for S3 operations against a single bucket
 */
export interface S3Client {
  /** Upload a buffer under the given key */
  putObject(key: string, body: Buffer): Promise<void>;

  /** List one page of objects under a prefix */
  listObjects(prefix: string, continuationToken?: string): Promise<S3ObjectPage>;

  /** Delete an object */
  deleteObject(key: string): Promise<void>;

  /** Probe that the bucket exists and is reachable */
  headBucket(): Promise<void>;
}

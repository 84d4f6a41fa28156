export interface ObjectRef {
  bucket: string;
  key: string;
}

export interface StoredImage {
  bytes: Uint8Array;
}

export interface ImageStore {
  get(ref: ObjectRef): Promise<StoredImage>;
  put(ref: ObjectRef, bytes: Uint8Array, contentType: string): Promise<void>;
}

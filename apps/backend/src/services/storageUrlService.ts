const GCS_SCHEME = "gs://";
const PUBLIC_BASE_URL = "https://storage.googleapis.com/";

export class MalformedStorageUriError extends Error {
  constructor(uri: string) {
    super(`malformed_storage_uri: ${uri}`);
    this.name = "MalformedStorageUriError";
  }
}

// gs://bucket/path -> https://storage.googleapis.com/bucket/path
export function getStorageUrl(gcsUri: string): string {
  const at = gcsUri.indexOf(GCS_SCHEME);
  if (at === -1) throw new MalformedStorageUriError(gcsUri);
  return PUBLIC_BASE_URL + gcsUri.slice(at + GCS_SCHEME.length).split(GCS_SCHEME)[0];
}

export interface FetchedImage {
  base64: string;
  contentType?: string;
}

/**
 * Downloads a remote image so it can be embedded as a data URI
 */
export interface IImageFetcher {
  fetchImage(url: string): Promise<FetchedImage>;
}

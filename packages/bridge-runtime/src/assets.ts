/**
 * @module @cmdbridge/runtime/assets
 */

export const ASSET_ORIGIN = 'asset://localhost';

/**
 * Map a local file path to the URL the embedding surface serves it under.
 *
 * The path is kept verbatim: every segment is percent-encoded and dot
 * segments are not resolved, so the host is always `localhost`.
 *
 * @example toAssetUrl('/tmp/icons/app.png') // "asset://localhost/tmp/icons/app.png"
 */
export function toAssetUrl(localPath: string | undefined): string | undefined {
  if (localPath === undefined) {
    return undefined;
  }
  const path = localPath.startsWith('/') ? localPath : `/${localPath}`;
  return ASSET_ORIGIN + path.split('/').map(encodeURIComponent).join('/');
}

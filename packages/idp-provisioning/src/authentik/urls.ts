/**
 * Derives an application slug from its display name: accents dropped, lower
 * case, runs of other characters collapsed to "-", no leading or trailing "-".
 * A name without any latin letter or digit yields "".
 *
 * @example
 * ```typescript
 * deriveSlug('Nextcloud Files'); // "nextcloud-files"
 * deriveSlug('Café Ñandú'); // "cafe-nandu"
 * ```
 */
export const deriveSlug = (name: string): string =>
  name
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');

/**
 * Drops the last `count` path segments of a URL string.
 */
export const dropPathSegments = (url: string, count: number): string => {
  let trimmed = url;
  for (let i = 0; i < count; i += 1) {
    const slash = trimmed.lastIndexOf('/');
    if (slash < 0) {
      break;
    }
    trimmed = trimmed.slice(0, slash);
  }
  return trimmed;
};

/**
 * The launch URL of an application is its redirect URI without the last two
 * path segments, e.g. `https://cloud.example.com/apps/user_oidc/code` becomes
 * `https://cloud.example.com/apps`.
 */
export const deriveLaunchUrl = (redirectUri: string): string => dropPathSegments(redirectUri, 2);

const trimTrailingSlash = (url: string): string => (url.endsWith('/') ? url.slice(0, -1) : url);

export const issuerUrl = (baseUrl: string, slug: string): string =>
  `${trimTrailingSlash(baseUrl)}/application/o/${slug}/`;

export const discoveryUrl = (baseUrl: string, slug: string): string =>
  `${issuerUrl(baseUrl, slug)}.well-known/openid-configuration`;

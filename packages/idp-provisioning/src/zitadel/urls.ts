/**
 * Post-logout redirect URI for an application: the redirect URI without its
 * last path segment, ending in a slash.
 *
 * @example
 * ```typescript
 * postLogoutUri('https://cloud.example.com/apps/user_oidc/code');
 * // 'https://cloud.example.com/apps/user_oidc/'
 * ```
 */
export const postLogoutUri = (redirectUri: string): string => {
  const cut = redirectUri.lastIndexOf('/');
  return `${cut === -1 ? redirectUri : redirectUri.slice(0, cut)}/`;
};

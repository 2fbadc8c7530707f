/**
 * Parts of the User-Agent sent to the provider.
 */
export interface UserAgentParts {
  readonly appName: string;
  readonly appVersion: string;
  /** Contact the provider can reach the developer at, usually an email */
  readonly contact?: string | undefined;
  /** Name of the identity the application acts for */
  readonly identityName?: string | undefined;
}

/**
 * Builds a User-Agent string: `appName/appVersion (contact; identity)`.
 * The parenthesized part is omitted when neither detail is given.
 *
 * @example
 * ```typescript
 * buildUserAgent({ appName: 'fleet-tool', appVersion: '1.2.0', contact: 'dev@example.com' });
 * // => "fleet-tool/1.2.0 (dev@example.com)"
 * ```
 */
export const buildUserAgent = (parts: UserAgentParts): string => {
  const product = `${parts.appName.trim().replace(/\s+/g, '-')}/${parts.appVersion.trim()}`;
  const details = [parts.contact, parts.identityName]
    .map((detail) => detail?.trim())
    .filter((detail): detail is string => detail !== undefined && detail.length > 0);

  return details.length === 0 ? product : `${product} (${details.join('; ')})`;
};

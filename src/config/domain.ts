/**
 * Domain Configuration for Court Alerts
 *
 * Centralizes domain-related constants used in outbound e-mails.
 */

/**
 * Primary domain for the application
 */
export const PRIMARY_DOMAIN = 'courtalerts.example';

/**
 * Application name displayed in emails
 */
export const APPLICATION_NAME = 'Court Alerts';

/**
 * Base URL for the frontend application
 */
export const FRONTEND_BASE_URL = `https://${PRIMARY_DOMAIN}`;

export const EMAIL_CONFIG = {
  fromAddress: `alerts@${PRIMARY_DOMAIN}`,
  fromName: APPLICATION_NAME,
} as const;

/**
 * Construct a full frontend URL
 *
 * @example
 * getFrontendUrl('/alerts/sub-1') // 'https://courtalerts.example/alerts/sub-1'
 */
export function getFrontendUrl(path: string, baseUrl: string = FRONTEND_BASE_URL): string {
  const normalizedPath = path.startsWith('/') ? path : `/${path}`;
  return `${baseUrl.replace(/\/+$/, '')}${normalizedPath}`;
}

/**
 * Environment-specific configuration
 * Can be overridden via environment variables for local development
 */
export const getDomainConfig = () => {
  const envFrontendUrl = process.env['FRONTEND_URL'];
  const envFromEmail = process.env['SES_FROM_EMAIL'];

  return {
    frontendUrl: envFrontendUrl || FRONTEND_BASE_URL,
    fromEmail: envFromEmail || EMAIL_CONFIG.fromAddress,
    applicationName: APPLICATION_NAME,
  };
};

/**
 * Centralized user-facing authentication messages
 * Keeps wording for each failure kind in one place
 */

export const AUTH_MESSAGES = {
  // Configuration
  CLIENT_NOT_BUILT:
    'Sign-in with this provider is not available: the application was not built with OAuth credentials. ' +
    'Please use another sign-in method or contact support for an updated version.',
  CLIENT_NOT_FOR_PLATFORM:
    'Sign-in with this provider is not configured for this platform. ' +
    'Please use another sign-in method or contact support.',
  INVALID_REDIRECT_URI: 'The OAuth redirect URI is not a loopback address. Please contact support.',
  BACKEND_NOT_CONFIGURED: 'The authentication server address is not configured. Please contact support.',
  INVALID_SETTING: 'The sign-in configuration is invalid. Please contact support.',

  // Listener and browser
  BIND_FAILED: 'Could not start the local sign-in listener. Close other sign-in windows and try again.',
  LAUNCH_FAILED: 'Could not open your web browser. Please try again.',

  // Redirect
  SECURITY: 'The sign-in response could not be verified and was rejected for your safety. Please start sign-in again.',
  CANCELLED_BY_USER: 'You cancelled sign-in.',
  DENIED: 'The sign-in provider did not grant access. Please try again.',
  MALFORMED: 'Sign-in failed: the provider returned an unexpected response. Please try again.',

  // Transport
  NETWORK: 'Could not reach the sign-in service. Check your internet connection and try again.',
  TIMEOUT: 'The sign-in service took too long to respond. Check your internet connection and try again.',
  REDIRECT_TIMEOUT: 'Sign-in was not completed in the browser in time. Please try again.',
  BACKEND_TIMEOUT:
    'Could not connect to the authentication server in time. Check that the server is reachable and try again.',

  // Exchange
  EXCHANGE_RETRY: 'Sign-in could not be completed because the authorization expired. Please try again.',
  EXCHANGE_SUPPORT: 'Sign-in is misconfigured for this application. Please contact support.',

  FLOW_CANCELLED: 'Sign-in was cancelled.',
  UNEXPECTED: 'Sign-in failed unexpectedly. Please try again.'
} as const;

export type ConfigurationReason =
  | 'missing_client_id'
  | 'unsupported_platform'
  | 'invalid_redirect_uri'
  | 'missing_backend_url'
  | 'invalid_setting';

const CONFIGURATION_MESSAGES: Record<ConfigurationReason, string> = {
  missing_client_id: AUTH_MESSAGES.CLIENT_NOT_BUILT,
  unsupported_platform: AUTH_MESSAGES.CLIENT_NOT_FOR_PLATFORM,
  invalid_redirect_uri: AUTH_MESSAGES.INVALID_REDIRECT_URI,
  missing_backend_url: AUTH_MESSAGES.BACKEND_NOT_CONFIGURED,
  invalid_setting: AUTH_MESSAGES.INVALID_SETTING
};

/**
 * Helper function to get guidance for a configuration failure
 */
export function getConfigurationMessage(reason: ConfigurationReason): string {
  return CONFIGURATION_MESSAGES[reason];
}

/**
 * Helper function to get guidance for a provider denial
 */
export function getDenialMessage(errorCode: string): string {
  switch (errorCode) {
    case 'access_denied':
      return AUTH_MESSAGES.CANCELLED_BY_USER;
    case 'invalid_client':
    case 'unauthorized_client':
    case 'redirect_uri_mismatch':
      return AUTH_MESSAGES.EXCHANGE_SUPPORT;
    default:
      return AUTH_MESSAGES.DENIED;
  }
}

/** Forward Email mail exchangers, both published at priority 10 */
export const FORWARD_EMAIL_MX_HOSTS = [
  'mx1.forwardemail.net',
  'mx2.forwardemail.net',
] as const;

/** Priority used for both MX records */
export const FORWARD_EMAIL_MX_PRIORITY = 10;

/** TXT attribute proving domain ownership (`forward-email-site-verification=<token>`) */
export const VERIFICATION_TXT_ATTRIBUTE = 'forward-email-site-verification';

/** TXT attribute for the catch-all forwarding rule (`forward-email=<destination>`) */
export const CATCH_ALL_TXT_ATTRIBUTE = 'forward-email';

/** Role aliases created on every domain, exempt from global uniqueness */
export const ROLE_ALIASES = ['info'] as const;

/** Split ratio between `first` and `first.last` aliases */
export const DEFAULT_FIRST_NAME_ONLY_RATIO = 0.6;

/** Total aliases per domain, role aliases included */
export const DEFAULT_ALIAS_COUNT = 50;

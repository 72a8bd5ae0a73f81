import { AlertTags } from '../../types/alert';

/**
 * OWASP Top 10 category tags with their reference pages
 */
export const OwaspTags = Object.freeze({
  OWASP_2021_A01: { OWASP_2021_A01: 'https://owasp.org/Top10/A01_2021-Broken_Access_Control/' },
  OWASP_2021_A04: { OWASP_2021_A04: 'https://owasp.org/Top10/A04_2021-Insecure_Design/' },
  OWASP_2021_A05: { OWASP_2021_A05: 'https://owasp.org/Top10/A05_2021-Security_Misconfiguration/' },
  OWASP_2021_A06: {
    OWASP_2021_A06: 'https://owasp.org/Top10/A06_2021-Vulnerable_and_Outdated_Components/',
  },
  OWASP_2017_A05: {
    OWASP_2017_A05: 'https://owasp.org/www-project-top-ten/2017/A5_2017-Broken_Access_Control.html',
  },
  OWASP_2017_A06: {
    OWASP_2017_A06:
      'https://owasp.org/www-project-top-ten/2017/A6_2017-Security_Misconfiguration.html',
  },
  OWASP_2017_A08: {
    OWASP_2017_A08: 'https://owasp.org/www-project-top-ten/2017/A8_2017-Insecure_Deserialization.html',
  },
  OWASP_2017_A09: {
    OWASP_2017_A09:
      'https://owasp.org/www-project-top-ten/2017/A9_2017-Using_Components_with_Known_Vulnerabilities.html',
  },
} as const);

/**
 * Scan policy tags. Their value is empty.
 */
export const PolicyTags = Object.freeze({
  PENTEST: { PENTEST: '' },
  QA_STD: { QA_STD: '' },
  QA_FULL: { QA_FULL: '' },
  DEV_STD: { DEV_STD: '' },
} as const);

/**
 * Merge tag maps, later entries win
 */
export function mergeTags(...parts: AlertTags[]): AlertTags {
  return Object.freeze(parts.reduce<Record<string, string>>((merged, part) => ({ ...merged, ...part }), {}));
}

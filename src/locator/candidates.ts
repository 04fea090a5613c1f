/**
 * Candidate documentation URL templates, in the order they are tried.
 * `{company}` is replaced by the normalized company name.
 */
export const CANDIDATE_URL_TEMPLATES: readonly string[] = [
  'https://api.{company}.com',
  'https://developer.{company}.com',
  'https://developers.{company}.com',
  'https://docs.{company}.com',
  'https://{company}.com/api',
  'https://{company}.com/docs',
  'https://{company}.com/developers',
  'https://www.{company}.com/api',
  'https://www.{company}.com/docs/api',
];

/**
 * Lower-case the name and drop everything but ASCII letters and digits
 */
export function normalizeCompanyName(companyName: string): string {
  return companyName.toLowerCase().replace(/[^a-z0-9]/g, '');
}

/**
 * Instantiate every template for a company; empty when the name has no usable characters
 */
export function buildCandidateUrls(
  companyName: string,
  templates: readonly string[] = CANDIDATE_URL_TEMPLATES
): string[] {
  const normalized = normalizeCompanyName(companyName);
  if (!normalized) {
    return [];
  }
  return templates.map((template) => template.replaceAll('{company}', normalized));
}

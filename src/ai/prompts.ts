/**
 * System prompt for the documentation lookup
 */
export const LOOKUP_SYSTEM_PROMPT = `You are an expert at finding public API documentation. Provide accurate, current URLs. Respond only with valid JSON.`;

/**
 * Ask for the root URL of a company's public API reference
 */
export function buildLookupPrompt(company: string): string {
  return `Find the URL of the public API reference documentation for "${company}".

The page should list the API's endpoints (HTTP methods and paths). Prefer the API reference over marketing or getting-started pages.

Respond ONLY with valid JSON in this exact format:
{
  "company_name": "${company}",
  "has_api": true,
  "documentation_url": "https://docs.example.com/api/reference"
}

If the company has no public API, set has_api to false and documentation_url to an empty string.`;
}

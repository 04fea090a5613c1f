/**
 * Suggests a documentation root URL once every generated candidate has failed.
 * The answer is untrusted: the locator probes it like any other candidate.
 */
export interface DocumentationLookup {
  suggestDocumentationUrl(company: string): Promise<string | undefined>;
}

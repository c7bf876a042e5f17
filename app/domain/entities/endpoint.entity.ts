export const OPENAI_ENDPOINTS = ['chat/completions', 'completions', 'embeddings'] as const;

export type OpenAIEndpoint = (typeof OPENAI_ENDPOINTS)[number];

export function isOpenAIEndpoint(value: string): value is OpenAIEndpoint {
  return OPENAI_ENDPOINTS.some(endpoint => endpoint === value);
}

export interface AccessRestrictions {
  readonly allowedGroups: readonly string[];
  readonly allowedDomains: readonly string[];
}

/**
 * Adaptor-specific configuration. `settings` is validated against the
 * adaptor's own schema when the adaptor is built; `extensions` is passed
 * through untouched for keys the schema does not know about.
 */
export interface AdaptorSettings {
  readonly settings: Readonly<Record<string, unknown>>;
  readonly extensions: Readonly<Record<string, unknown>>;
}

export interface Endpoint extends AccessRestrictions, AdaptorSettings {
  readonly slug: string;
  readonly cluster: string;
  readonly framework: string;
  readonly model: string;
  readonly adaptorType: string;
  readonly timeoutMs?: number;
}

/**
 * Lower-cases, drops anything that is not a word character, space or hyphen,
 * then collapses runs of spaces and hyphens into a single hyphen.
 */
export function slugify(value: string): string {
  return value
    .normalize('NFKD')
    .toLowerCase()
    .replace(/[^\w\s-]/g, '')
    .replace(/[-\s]+/g, '-')
    .replace(/^[-_]+|[-_]+$/g, '');
}

export function buildEndpointSlug(cluster: string, framework: string, model: string): string {
  return slugify([cluster, framework, model].join(' '));
}

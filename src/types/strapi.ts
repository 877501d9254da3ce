/**
 * Strapi Types
 *
 * Narrow typings for the parts of Strapi this app touches: the `env` helper
 * passed to config files and the document service for our content types.
 */

/**
 * The `env` helper Strapi passes to `config/*.ts`.
 */
export interface StrapiEnv {
  (key: string): string | undefined;
  (key: string, defaultValue: string): string;
  int(key: string, defaultValue?: number): number;
  bool(key: string, defaultValue?: boolean): boolean;
  array(key: string, defaultValue?: string[]): string[];
}

export interface StrapiConfigContext {
  readonly env: StrapiEnv;
}

/**
 * Base document with common Strapi fields
 */
export interface StrapiDocument {
  id: number;
  documentId: string;
  createdAt: string;
  updatedAt: string;
}

/**
 * Evaluation record document (api::evaluation-record.evaluation-record)
 */
export interface EvaluationRecordDocument extends StrapiDocument {
  runId: string;
  scores: unknown;
  failures: unknown;
  startedAt: string;
  completedAt: string;
}

export interface DocumentQueryOptions {
  filters?: Record<string, unknown>;
  sort?: string | string[];
  limit?: number;
}

/**
 * Subset of Strapi 5's document service used by this app.
 */
export interface StrapiDocumentService<T> {
  findMany(options?: DocumentQueryOptions): Promise<T[]>;
  create(options: { data: Partial<T> }): Promise<T>;
}

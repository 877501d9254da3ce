/**
 * Product Catalog
 *
 * Reads the catalog JSON file and validates every entry.
 */

import { readFile } from 'fs/promises';
import { z } from 'zod';

import type { ProductDocument } from '../types';

const ProductDocumentSchema = z.object({
  id: z.string().min(1),
  title: z.string().min(1),
  content: z.string().min(1),
  url: z.string().url().optional(),
});

export const ProductCatalogSchema = z.array(ProductDocumentSchema);

export class ProductCatalogError extends Error {
  constructor(
    message: string,
    readonly cause?: Error
  ) {
    super(message);
    this.name = 'ProductCatalogError';
  }
}

/**
 * Parses catalog JSON. Duplicate ids are rejected.
 */
export function parseProductCatalog(raw: unknown): ProductDocument[] {
  const parsed = ProductCatalogSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ProductCatalogError(`Invalid product catalog: ${details}`);
  }

  const ids = new Set<string>();
  for (const doc of parsed.data) {
    if (ids.has(doc.id)) {
      throw new ProductCatalogError(`Invalid product catalog: duplicate id "${doc.id}"`);
    }
    ids.add(doc.id);
  }
  return parsed.data;
}

export async function loadProductCatalog(filePath: string): Promise<ProductDocument[]> {
  let text: string;
  try {
    text = await readFile(filePath, 'utf8');
  } catch (error) {
    throw new ProductCatalogError(
      `Cannot read product catalog at ${filePath}`,
      error instanceof Error ? error : undefined
    );
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new ProductCatalogError(
      `Product catalog at ${filePath} is not valid JSON`,
      error instanceof Error ? error : undefined
    );
  }
  return parseProductCatalog(json);
}

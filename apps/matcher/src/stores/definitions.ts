/**
 * Store definitions file
 *
 *   {
 *     "stores": [
 *       {
 *         "id": "moto-parts",
 *         "name": "Moto Parts",
 *         "searchUrl": "https://moto-parts.example/search?q={query}",
 *         "productLinkSelector": ".product-list a.product-link"
 *       }
 *     ]
 *   }
 */

import { readFile } from 'fs/promises'
import { z } from 'zod'
import { StoreDefinitionError } from '../errors'
import { safeJsonParse } from '../signals/html'
import type { StoreDefinition } from './types'

export const QUERY_PLACEHOLDER = '{query}'

// Ids end up in cache file names
const STORE_ID_PATTERN = /^[a-z0-9][a-z0-9_-]*$/

const storeDefinitionSchema = z.object({
  id: z.string().regex(STORE_ID_PATTERN, 'Store id must be lowercase letters, digits, "-" or "_"'),
  name: z.string().trim().min(1),
  searchUrl: z
    .string()
    .url()
    .refine((url) => url.includes(QUERY_PLACEHOLDER), {
      message: `searchUrl must contain ${QUERY_PLACEHOLDER}`,
    }),
  productLinkSelector: z.string().trim().min(1).optional(),
  enabled: z.boolean().default(true),
})

const storeDefinitionsFileSchema = z
  .object({
    stores: z.array(storeDefinitionSchema),
  })
  .superRefine((file, ctx) => {
    const seen = new Set<string>()
    file.stores.forEach((store, index) => {
      if (seen.has(store.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Duplicate store id: ${store.id}`,
          path: ['stores', index, 'id'],
        })
      }
      seen.add(store.id)
    })
  })

/**
 * Validate parsed store definitions.
 *
 * @throws StoreDefinitionError listing every failing field
 */
export function parseStoreDefinitions(raw: unknown): StoreDefinition[] {
  const result = storeDefinitionsFileSchema.safeParse(raw)
  if (!result.success) {
    throw new StoreDefinitionError('Invalid store definitions', {
      issues: result.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
    })
  }
  return result.data.stores
}

/**
 * Read and validate a store definitions file.
 *
 * @throws StoreDefinitionError when the file is unreadable, not JSON or invalid
 */
export async function loadStoreDefinitions(path: string): Promise<StoreDefinition[]> {
  let content: string
  try {
    content = await readFile(path, 'utf-8')
  } catch (error) {
    throw new StoreDefinitionError(`Store definitions not readable: ${path}`, { path }, { cause: error })
  }

  const parsed = safeJsonParse(content)
  if (!parsed.ok) {
    throw new StoreDefinitionError(`Store definitions are not valid JSON: ${parsed.error}`, { path })
  }
  return parseStoreDefinitions(parsed.value)
}

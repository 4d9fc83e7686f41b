/**
 * Competitor list, loaded from a JSON file and validated with zod.
 */

import { readFile } from 'node:fs/promises'
import { z } from 'zod'
import { ConfigError, errorMessageOf } from '../pipeline/errors.js'
import type { Competitor } from '../pipeline/types.js'
import { slugify } from '../pipeline/utils/text.js'

const httpUrl = z
  .string()
  .trim()
  .url()
  .refine((value) => /^https?:\/\//i.test(value), 'must be an http(s) URL')

const crawlSchema = z
  .object({
    depth: z.number().int().min(1).max(5).default(2),
    limit: z.number().int().min(1).max(1000).default(50),
  })
  .default({})

const competitorSchema = z
  .object({
    id: z
      .string()
      .trim()
      .regex(/^[a-z0-9]+(?:-[a-z0-9]+)*$/, 'must be a lowercase slug')
      .optional(),
    name: z.string().trim().min(1, 'cannot be empty'),
    newProductUrls: z.array(httpUrl).default([]),
    promotionUrls: z.array(httpUrl).default([]),
    crawl: crawlSchema,
    excludePatterns: z.array(z.string().trim().min(1)).default([]),
    enabled: z.boolean().default(true),
    tags: z.array(z.string()).default([]),
  })
  .refine((c) => c.newProductUrls.length + c.promotionUrls.length > 0, {
    message: 'needs at least one seed URL',
    path: ['newProductUrls'],
  })
  .transform(
    (c): Competitor => ({
      id: c.id ?? slugify(c.name),
      name: c.name,
      newProductUrls: c.newProductUrls,
      promotionUrls: c.promotionUrls,
      crawl: c.crawl,
      excludePatterns: c.excludePatterns,
      enabled: c.enabled,
      tags: [...new Set(c.tags.map((tag) => tag.trim().toLowerCase()).filter(Boolean))],
    })
  )

const competitorsFileSchema = z
  .object({
    competitors: z.array(competitorSchema).min(1, 'must list at least one competitor'),
  })
  .superRefine((file, ctx) => {
    // Records are keyed by display name, so names must be unique too
    const seenIds = new Set<string>()
    const seenNames = new Set<string>()
    file.competitors.forEach((competitor, index) => {
      if (seenIds.has(competitor.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['competitors', index, 'id'],
          message: `duplicate competitor id "${competitor.id}"`,
        })
      }
      const name = competitor.name.toLowerCase()
      if (seenNames.has(name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['competitors', index, 'name'],
          message: `duplicate competitor name "${competitor.name}"`,
        })
      }
      seenIds.add(competitor.id)
      seenNames.add(name)
    })
  })

/**
 * Validate already-parsed competitor configuration.
 *
 * @throws ConfigError listing every problem
 */
export function parseCompetitors(data: unknown): Competitor[] {
  const parsed = competitorsFileSchema.safeParse(data)
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    throw new ConfigError(`Invalid competitor configuration: ${issues.join('; ')}`, issues)
  }
  return parsed.data.competitors.map((competitor) => Object.freeze(competitor))
}

/**
 * Read and validate the competitor file.
 *
 * @throws ConfigError when the file is missing, not JSON, or invalid
 */
export async function loadCompetitors(path: string): Promise<Competitor[]> {
  let raw: string
  try {
    raw = await readFile(path, 'utf8')
  } catch (error) {
    throw new ConfigError(`Cannot read competitor file ${path}: ${errorMessageOf(error)}`, [], { cause: error })
  }

  let data: unknown
  try {
    data = JSON.parse(raw)
  } catch (error) {
    throw new ConfigError(`Competitor file ${path} is not valid JSON: ${errorMessageOf(error)}`, [], { cause: error })
  }

  return parseCompetitors(data)
}

/**
 * Competitors to run: enabled ones, optionally narrowed to one id.
 */
export function selectCompetitors(competitors: readonly Competitor[], onlyId?: string): Competitor[] {
  const enabled = competitors.filter((competitor) => competitor.enabled)
  if (!onlyId) {
    return enabled
  }
  const match = enabled.filter((competitor) => competitor.id === onlyId)
  if (match.length === 0) {
    throw new ConfigError(`No enabled competitor with id "${onlyId}"`)
  }
  return match
}

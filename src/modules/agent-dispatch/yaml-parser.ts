/**
 * YAML extraction and parsing for sub-agent output.
 *
 * Sub-agents emit structured YAML at the END of their output. This module
 * extracts and validates that YAML block regardless of surrounding narrative
 * text or code fences.
 *
 * Extraction strategy:
 * 1. Look for fenced YAML blocks (```yaml...```) containing the anchor key
 * 2. Fall back to unfenced lines starting at the last anchor key
 * 3. If multiple blocks exist, take the LAST one
 * 4. Parse with js-yaml and validate with a Zod schema
 */

import yaml from 'js-yaml'
import type { z } from 'zod'

/** Key that starts every worker result block */
export const YAML_ANCHOR_KEY = 'verdict:'

// ---------------------------------------------------------------------------
// extractYamlBlock
// ---------------------------------------------------------------------------

/**
 * Extract the YAML result block from worker output, or null if there is none.
 */
export function extractYamlBlock(output: string): string | null {
  if (output.trim() === '') {
    return null
  }
  return extractLastFencedYaml(output) ?? extractUnfencedYaml(output)
}

function extractLastFencedYaml(output: string): string | null {
  const fencePattern = /```(?:ya?ml)?\s*\n([\s\S]*?)```/g

  let lastMatch: string | null = null
  let match: RegExpExecArray | null

  while ((match = fencePattern.exec(output)) !== null) {
    const content = match[1]
    if (content !== undefined && content.includes(YAML_ANCHOR_KEY)) {
      lastMatch = content.trim()
    }
  }

  return lastMatch
}

function extractUnfencedYaml(output: string): string | null {
  const lines = output.split('\n')
  const anchorLineIdx = findLastIndex(lines, (line) => line.startsWith(YAML_ANCHOR_KEY))
  if (anchorLineIdx === -1) {
    return null
  }
  const yamlText = lines.slice(anchorLineIdx).join('\n').trim()
  return yamlText !== '' ? yamlText : null
}

function findLastIndex<T>(items: T[], predicate: (item: T) => boolean): number {
  for (let i = items.length - 1; i >= 0; i--) {
    const item = items[i]
    if (item !== undefined && predicate(item)) return i
  }
  return -1
}

// ---------------------------------------------------------------------------
// parseYamlResult
// ---------------------------------------------------------------------------

export type YamlParseResult<T> = { parsed: T; error: null } | { parsed: null; error: string }

/**
 * Parse a YAML string and validate it against a Zod schema.
 */
export function parseYamlResult<T>(
  yamlText: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): YamlParseResult<T> {
  let raw: unknown

  try {
    raw = yaml.load(yamlText)
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    return { parsed: null, error: `YAML parse error: ${message}` }
  }

  if (raw === null || raw === undefined) {
    return { parsed: null, error: 'YAML parsed to null or undefined' }
  }

  const result = schema.safeParse(raw)
  if (result.success) {
    return { parsed: result.data, error: null }
  }

  return {
    parsed: null,
    error: `Schema validation error: ${result.error.issues
      .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
      .join('; ')}`,
  }
}

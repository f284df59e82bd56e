/**
 * Feature capability resolution for object-storage tests.
 *
 * Configuration speaks in whitespace-separated token strings plus the
 * ALL_FEATURES / NO_FEATURES sentinels; everything past the boundary works
 * with the FeatureSet variant so a sentinel can never be confused with a
 * literal token.
 */

import { ALL_FEATURES, NO_FEATURES } from '../config/index.js'

// ============================================================================
// Types
// ============================================================================

export type FeatureSet =
  | { readonly kind: 'all' }
  | { readonly kind: 'none' }
  | { readonly kind: 'subset'; readonly features: ReadonlySet<string> }

export const ALL: FeatureSet = Object.freeze({ kind: 'all' })
export const NONE: FeatureSet = Object.freeze({ kind: 'none' })

export function subset(features: Iterable<string>): FeatureSet {
  return { kind: 'subset', features: new Set(features) }
}

export interface FeatureResolutionInput {
  /** Configured `features` string */
  configured: string
  /** Configured `excludedFeatures` string */
  excluded: string
  /** Tokens reported by the server, when discovery is enabled */
  reported?: readonly string[]
}

export type GateDecision =
  | { readonly skip: false }
  | { readonly skip: true; readonly reason: string; readonly missing: readonly string[] }

// ============================================================================
// Parsing & Formatting
// ============================================================================

/**
 * Split a feature string on whitespace, dropping empty tokens
 */
export function splitFeatures(value: string): string[] {
  return value.split(/\s+/).filter((token) => token.length > 0)
}

/**
 * A configured list is either the ALL_FEATURES sentinel or a token list.
 * The sentinel anywhere in the list wins.
 */
function parseConfiguredList(value: string): 'all' | string[] {
  const tokens = splitFeatures(value)
  return tokens.includes(ALL_FEATURES) ? 'all' : tokens.filter((token) => token !== NO_FEATURES)
}

/**
 * Canonical string form: a sentinel, or the tokens joined by single spaces
 */
export function formatFeatureSet(set: FeatureSet): string {
  switch (set.kind) {
    case 'all':
      return ALL_FEATURES
    case 'none':
      return NO_FEATURES
    case 'subset':
      return [...set.features].join(' ')
  }
}

/**
 * Inverse of formatFeatureSet
 */
export function parseFeatureSet(value: string): FeatureSet {
  const trimmed = value.trim()
  if (trimmed === ALL_FEATURES) return ALL
  if (trimmed === NO_FEATURES) return NONE
  return subset(splitFeatures(trimmed))
}

// ============================================================================
// Resolution
// ============================================================================

/**
 * Effective feature set: (reported ∪ configured) \ excluded.
 *
 * ALL_FEATURES in `configured` short-circuits to ALL before exclusions are
 * looked at; ALL_FEATURES in `excluded` yields NONE. Excluding a token that
 * is not present is a no-op.
 */
export function resolveFeatures(input: FeatureResolutionInput): FeatureSet {
  const configured = parseConfiguredList(input.configured)
  const excluded = parseConfiguredList(input.excluded)

  if (configured === 'all') {
    return ALL
  }
  if (excluded === 'all') {
    return NONE
  }

  const features = new Set<string>(configured)
  for (const token of input.reported ?? []) {
    features.add(token)
  }
  for (const token of excluded) {
    features.delete(token)
  }
  return { kind: 'subset', features }
}

/**
 * Required tokens missing from the set. Empty for ALL; every token for NONE.
 */
export function missingFeatures(set: FeatureSet, required: readonly string[]): string[] {
  switch (set.kind) {
    case 'all':
      return []
    case 'none':
      return [...required]
    case 'subset':
      return required.filter((token) => !set.features.has(token))
  }
}

/**
 * Decide whether a test requiring `required` should be skipped
 */
export function checkRequiredFeatures(set: FeatureSet, required: readonly string[]): GateDecision {
  if (set.kind === 'all') {
    return { skip: false }
  }
  if (set.kind === 'none') {
    return { skip: true, reason: 'skipping all features', missing: [...required] }
  }

  const missing = missingFeatures(set, required)
  if (missing.length === 0) {
    return { skip: false }
  }
  return { skip: true, reason: `requires features: ${missing.join(', ')}`, missing }
}

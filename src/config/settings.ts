/**
 * Probe Configuration
 *
 * Builds the read-only configuration surface shared by the auth provider,
 * clients and fixtures. Sources, lowest precedence first:
 *
 * 1. built-in defaults
 * 2. a JSON file (path from `file` or `CLOUDPROBE_CONFIG`)
 * 3. `CLOUDPROBE_*` environment variables
 * 4. programmatic overrides
 */

import { readFileSync } from 'fs'
import { z } from 'zod'
import { ConfigError, toError } from '../errors/index.js'
import { setLogDefaults } from '../utils/logger.js'

// ============================================================================
// Feature Sentinels
// ============================================================================

/** Configured in `features`: assume the server supports every feature */
export const ALL_FEATURES = '__ALL__'

/** Resolved value meaning no feature may be assumed */
export const NO_FEATURES = '__NONE__'

// ============================================================================
// Schema
// ============================================================================

export const AUTH_STRATEGIES = ['keystone', 'rax_auth', 'saio_tempauth'] as const

export type AuthStrategy = (typeof AUTH_STRATEGIES)[number]

const httpUrl = z
  .string()
  .url()
  .refine((value) => /^https?:\/\//.test(value), { message: 'must use http or https' })

const userAuthSchema = z
  .object({
    strategy: z
      .string()
      .transform((value) => value.toLowerCase())
      .pipe(z.enum(AUTH_STRATEGIES)),
    endpoint: httpUrl,
    username: z.string().min(1),
    password: z.string().optional(),
    apiKey: z.string().optional(),
    tenantName: z.string().optional(),
  })
  .strict()
  .superRefine((auth, ctx) => {
    if (auth.strategy === 'rax_auth' && !auth.apiKey) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['apiKey'], message: 'required for rax_auth' })
    }
    if (auth.strategy !== 'rax_auth' && !auth.password) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['password'], message: `required for ${auth.strategy}` })
    }
  })

const objectStorageSchema = z
  .object({
    identityServiceName: z.string().min(1),
    region: z.string().min(1),
  })
  .strict()

const objectStorageApiSchema = z
  .object({
    features: z.string(),
    excludedFeatures: z.string(),
    baseContainerName: z.string().min(1),
    baseObjectName: z.string().min(1),
    useSwiftInfo: z.boolean(),
  })
  .strict()

const imagesSchema = z
  .object({
    identityServiceName: z.string().min(1),
    region: z.string().min(1),
    endpointOverride: httpUrl.optional(),
    containerFormat: z.string().min(1),
    diskFormat: z.string().min(1),
  })
  .strict()

const httpSchema = z
  .object({
    requestTimeoutMs: z.number().int().positive(),
  })
  .strict()

const loggingSchema = z
  .object({
    level: z.enum(['debug', 'info', 'warn', 'error']),
    format: z.enum(['json', 'text']),
  })
  .strict()

export const configSchema = z
  .object({
    userAuth: userAuthSchema,
    objectStorage: objectStorageSchema,
    objectStorageApi: objectStorageApiSchema,
    images: imagesSchema,
    http: httpSchema,
    logging: loggingSchema,
  })
  .strict()

export type ProbeConfig = z.infer<typeof configSchema>
export type UserAuthConfig = ProbeConfig['userAuth']
export type ObjectStorageConfig = ProbeConfig['objectStorage']
export type ObjectStorageApiConfig = ProbeConfig['objectStorageApi']
export type ImagesConfig = ProbeConfig['images']

/**
 * Partial configuration accepted as file content or overrides
 */
export type ProbeConfigInput = {
  [S in keyof ProbeConfig]?: Partial<z.input<typeof configSchema>[S]>
}

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_CONFIG: ProbeConfigInput = {
  userAuth: {
    strategy: 'keystone',
  },
  objectStorage: {
    identityServiceName: 'cloudFiles',
    region: 'RegionOne',
  },
  objectStorageApi: {
    features: '',
    excludedFeatures: '',
    baseContainerName: 'qe_container',
    baseObjectName: 'qe_object',
    useSwiftInfo: true,
  },
  images: {
    identityServiceName: 'cloudImages',
    region: 'RegionOne',
    containerFormat: 'bare',
    diskFormat: 'raw',
  },
  http: {
    requestTimeoutMs: 30_000,
  },
  logging: {
    level: 'info',
    format: 'text',
  },
}

// ============================================================================
// Environment
// ============================================================================

type EnvKind = 'string' | 'boolean' | 'integer'

/**
 * Environment variable -> [section, key, kind]
 */
const ENV_VARIABLES: Record<string, [keyof ProbeConfig, string, EnvKind]> = {
  CLOUDPROBE_AUTH_STRATEGY: ['userAuth', 'strategy', 'string'],
  CLOUDPROBE_AUTH_ENDPOINT: ['userAuth', 'endpoint', 'string'],
  CLOUDPROBE_AUTH_USERNAME: ['userAuth', 'username', 'string'],
  CLOUDPROBE_AUTH_PASSWORD: ['userAuth', 'password', 'string'],
  CLOUDPROBE_AUTH_API_KEY: ['userAuth', 'apiKey', 'string'],
  CLOUDPROBE_AUTH_TENANT_NAME: ['userAuth', 'tenantName', 'string'],
  CLOUDPROBE_OBJECTSTORAGE_SERVICE_NAME: ['objectStorage', 'identityServiceName', 'string'],
  CLOUDPROBE_OBJECTSTORAGE_REGION: ['objectStorage', 'region', 'string'],
  CLOUDPROBE_OBJECTSTORAGE_FEATURES: ['objectStorageApi', 'features', 'string'],
  CLOUDPROBE_OBJECTSTORAGE_EXCLUDED_FEATURES: ['objectStorageApi', 'excludedFeatures', 'string'],
  CLOUDPROBE_OBJECTSTORAGE_BASE_CONTAINER_NAME: ['objectStorageApi', 'baseContainerName', 'string'],
  CLOUDPROBE_OBJECTSTORAGE_BASE_OBJECT_NAME: ['objectStorageApi', 'baseObjectName', 'string'],
  CLOUDPROBE_OBJECTSTORAGE_USE_SWIFT_INFO: ['objectStorageApi', 'useSwiftInfo', 'boolean'],
  CLOUDPROBE_IMAGES_SERVICE_NAME: ['images', 'identityServiceName', 'string'],
  CLOUDPROBE_IMAGES_REGION: ['images', 'region', 'string'],
  CLOUDPROBE_IMAGES_ENDPOINT: ['images', 'endpointOverride', 'string'],
  CLOUDPROBE_IMAGES_CONTAINER_FORMAT: ['images', 'containerFormat', 'string'],
  CLOUDPROBE_IMAGES_DISK_FORMAT: ['images', 'diskFormat', 'string'],
  CLOUDPROBE_HTTP_TIMEOUT_MS: ['http', 'requestTimeoutMs', 'integer'],
  CLOUDPROBE_LOG_LEVEL: ['logging', 'level', 'string'],
  CLOUDPROBE_LOG_FORMAT: ['logging', 'format', 'string'],
}

const TRUE_VALUES = ['1', 'true', 'yes', 'on']
const FALSE_VALUES = ['0', 'false', 'no', 'off']

function parseEnvValue(name: string, raw: string, kind: EnvKind): string | boolean | number {
  if (kind === 'boolean') {
    const value = raw.trim().toLowerCase()
    if (TRUE_VALUES.includes(value)) return true
    if (FALSE_VALUES.includes(value)) return false
    throw new ConfigError('invalid-config', `${name} must be a boolean, got "${raw}"`, { variable: name })
  }
  if (kind === 'integer') {
    if (!/^\d+$/.test(raw.trim())) {
      throw new ConfigError('invalid-config', `${name} must be a whole number, got "${raw}"`, { variable: name })
    }
    return Number.parseInt(raw, 10)
  }
  return raw
}

// ============================================================================
// Loading
// ============================================================================

type RawConfig = Record<string, Record<string, unknown>>

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function mergeInto(target: RawConfig, source: unknown, origin: string): void {
  if (source === undefined) {
    return
  }
  if (!isRecord(source)) {
    throw new ConfigError('invalid-config', `${origin}: configuration must be an object`)
  }
  for (const [section, values] of Object.entries(source)) {
    if (!isRecord(values)) {
      throw new ConfigError('invalid-config', `${origin}: section "${section}" must be an object`)
    }
    target[section] = { ...target[section], ...values }
  }
}

function readConfigFile(path: string): unknown {
  try {
    return JSON.parse(readFileSync(path, 'utf8'))
  } catch (error) {
    throw new ConfigError('unreadable-file', `Cannot read configuration file ${path}`, {
      path,
      cause: toError(error),
    })
  }
}

export interface LoadConfigOptions {
  /** Environment to read CLOUDPROBE_* variables from (default: process.env) */
  env?: Record<string, string | undefined>
  /** JSON file path; overrides CLOUDPROBE_CONFIG */
  file?: string
  /** Applied in order after the environment */
  overrides?: ProbeConfigInput | readonly ProbeConfigInput[]
}

/**
 * Load and validate the configuration
 *
 * @throws ConfigError naming the first offending path when validation fails
 */
export function loadConfig(options: LoadConfigOptions = {}): Readonly<ProbeConfig> {
  const env = options.env ?? process.env
  const raw: RawConfig = {}

  mergeInto(raw, DEFAULT_CONFIG, 'defaults')

  const file = options.file ?? env.CLOUDPROBE_CONFIG
  if (file) {
    mergeInto(raw, readConfigFile(file), file)
  }

  const fromEnv: RawConfig = {}
  for (const [name, [section, key, kind]] of Object.entries(ENV_VARIABLES)) {
    const value = env[name]
    if (value === undefined || value === '') continue
    fromEnv[section] = { ...fromEnv[section], [key]: parseEnvValue(name, value, kind) }
  }
  mergeInto(raw, fromEnv, 'environment')

  const overrides = Array.isArray(options.overrides) ? options.overrides : [options.overrides]
  for (const override of overrides) {
    mergeInto(raw, override, 'overrides')
  }

  const result = configSchema.safeParse(raw)
  if (!result.success) {
    const [issue] = result.error.issues
    const path = issue ? issue.path.join('.') : ''
    throw new ConfigError('invalid-config', `Invalid configuration at ${path}: ${issue?.message ?? 'unknown error'}`, {
      issues: result.error.issues,
    })
  }

  return deepFreeze(result.data)
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const nested of Object.values(value)) {
    if (isRecord(nested)) {
      deepFreeze(nested)
    }
  }
  return Object.freeze(value)
}

/**
 * Whether functional suites should target a deployed cloud instead of the
 * in-process emulators
 */
export function isLiveMode(env: Record<string, string | undefined> = process.env): boolean {
  return TRUE_VALUES.includes((env.CLOUDPROBE_LIVE ?? '').trim().toLowerCase())
}

/**
 * Make the configured level and format the default for every logger that
 * does not set its own
 */
export function applyLoggingConfig(config: Readonly<ProbeConfig>): void {
  setLogDefaults({ level: config.logging.level, format: config.logging.format })
}

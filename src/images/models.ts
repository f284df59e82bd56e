/**
 * Image service v2 entities.
 *
 * Fields outside the known image schema are the image's additional
 * properties (user-defined key/value pairs); they are split out into
 * `additionalProperties` on decode.
 */

import { z } from 'zod'

const KNOWN_FIELDS = new Set([
  'id',
  'name',
  'status',
  'visibility',
  'protected',
  'tags',
  'container_format',
  'disk_format',
  'min_disk',
  'min_ram',
  'size',
  'virtual_size',
  'checksum',
  'owner',
  'created_at',
  'updated_at',
  'self',
  'file',
  'schema',
  'direct_url',
  'locations',
])

export interface Image {
  id: string
  name: string | null
  status: string
  visibility: string
  protected: boolean
  tags: string[]
  containerFormat: string | null
  diskFormat: string | null
  minDisk: number
  minRam: number
  size: number | null
  checksum: string | null
  owner: string | null
  createdAt?: string
  updatedAt?: string
  self?: string
  file?: string
  schema?: string
  /** User-defined properties, keyed by property name */
  additionalProperties: Record<string, unknown>
}

const rawImageSchema = z
  .object({
    id: z.string(),
    name: z.string().nullable().default(null),
    status: z.string(),
    visibility: z.string().default('private'),
    protected: z.boolean().default(false),
    tags: z.array(z.string()).default([]),
    container_format: z.string().nullable().default(null),
    disk_format: z.string().nullable().default(null),
    min_disk: z.number().default(0),
    min_ram: z.number().default(0),
    size: z.number().nullable().default(null),
    checksum: z.string().nullable().default(null),
    owner: z.string().nullable().default(null),
    created_at: z.string().optional(),
    updated_at: z.string().optional(),
    self: z.string().optional(),
    file: z.string().optional(),
    schema: z.string().optional(),
  })
  .passthrough()

export const imageSchema = rawImageSchema.transform((raw): Image => {
  const additionalProperties: Record<string, unknown> = {}
  for (const [key, value] of Object.entries(raw)) {
    if (!KNOWN_FIELDS.has(key)) {
      additionalProperties[key] = value
    }
  }

  return {
    id: raw.id,
    name: raw.name,
    status: raw.status,
    visibility: raw.visibility,
    protected: raw.protected,
    tags: raw.tags,
    containerFormat: raw.container_format,
    diskFormat: raw.disk_format,
    minDisk: raw.min_disk,
    minRam: raw.min_ram,
    size: raw.size,
    checksum: raw.checksum,
    owner: raw.owner,
    createdAt: raw.created_at,
    updatedAt: raw.updated_at,
    self: raw.self,
    file: raw.file,
    schema: raw.schema,
    additionalProperties,
  }
})

export const imageListSchema = z.object({
  images: z.array(imageSchema),
  next: z.string().optional(),
})

export type ImageList = z.infer<typeof imageListSchema>

/**
 * Fields accepted on image creation. `properties` become additional
 * properties of the image.
 */
export interface CreateImageRequest {
  name?: string
  containerFormat?: string
  diskFormat?: string
  visibility?: 'public' | 'private' | 'shared' | 'community'
  protected?: boolean
  tags?: string[]
  minDisk?: number
  minRam?: number
  properties?: Record<string, string>
}

export function toCreateImageBody(request: CreateImageRequest): Record<string, unknown> {
  const body: Record<string, unknown> = { ...request.properties }
  if (request.name !== undefined) body.name = request.name
  if (request.containerFormat !== undefined) body.container_format = request.containerFormat
  if (request.diskFormat !== undefined) body.disk_format = request.diskFormat
  if (request.visibility !== undefined) body.visibility = request.visibility
  if (request.protected !== undefined) body.protected = request.protected
  if (request.tags !== undefined) body.tags = request.tags
  if (request.minDisk !== undefined) body.min_disk = request.minDisk
  if (request.minRam !== undefined) body.min_ram = request.minRam
  return body
}

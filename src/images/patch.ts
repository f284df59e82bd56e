/**
 * JSON-patch documents for image updates.
 */

/** Media type the image service requires on PATCH */
export const IMAGE_PATCH_MEDIA_TYPE = 'application/openstack-images-v2.1-json-patch'

export type PatchOperationKind = 'add' | 'remove' | 'replace'

/**
 * Property mutations grouped by operation kind. Values under `remove` are
 * ignored; only the keys matter.
 */
export interface ImagePatch {
  add?: Record<string, unknown>
  remove?: Record<string, unknown>
  replace?: Record<string, unknown>
}

export type JsonPatchOperation =
  | { op: 'add' | 'replace'; path: string; value: unknown }
  | { op: 'remove'; path: string }

/**
 * RFC 6901 pointer for a top-level property
 */
export function propertyPointer(name: string): string {
  return `/${name.replace(/~/g, '~0').replace(/\//g, '~1')}`
}

/**
 * Inverse of propertyPointer for single-segment pointers
 */
export function pointerProperty(pointer: string): string | undefined {
  if (!pointer.startsWith('/') || pointer.indexOf('/', 1) !== -1) {
    return undefined
  }
  return pointer.slice(1).replace(/~1/g, '/').replace(/~0/g, '~')
}

/**
 * Render the patch as operations: all adds, then removes, then replaces
 */
export function buildImagePatch(patch: ImagePatch): JsonPatchOperation[] {
  const operations: JsonPatchOperation[] = []
  for (const [name, value] of Object.entries(patch.add ?? {})) {
    operations.push({ op: 'add', path: propertyPointer(name), value })
  }
  for (const name of Object.keys(patch.remove ?? {})) {
    operations.push({ op: 'remove', path: propertyPointer(name) })
  }
  for (const [name, value] of Object.entries(patch.replace ?? {})) {
    operations.push({ op: 'replace', path: propertyPointer(name), value })
  }
  return operations
}

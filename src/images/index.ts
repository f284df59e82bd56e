/**
 * Images Module
 *
 * Re-exports all public APIs from the images module.
 */

export { ImagesClient, type ListImagesQuery } from './client.js'
export { ImagesBehaviors } from './behaviors.js'
export {
  imageSchema,
  imageListSchema,
  toCreateImageBody,
  type Image,
  type ImageList,
  type CreateImageRequest,
} from './models.js'
export {
  buildImagePatch,
  propertyPointer,
  pointerProperty,
  IMAGE_PATCH_MEDIA_TYPE,
  type ImagePatch,
  type JsonPatchOperation,
  type PatchOperationKind,
} from './patch.js'

/**
 * Cloudinary Avatar Storage
 *
 * Uploads are keyed by public id with overwrite on, so each user has exactly
 * one stored image. The returned URL is a 250x250 fill crop pinned to the
 * uploaded version, which busts CDN caches after a re-upload.
 */

import { v2 as cloudinary, UploadApiResponse } from 'cloudinary';
import { env } from '@/config/env';
import { AVATAR_LIMITS } from '@/config/businessRules';
import { AvatarUpload, IAvatarStorage } from '@/interfaces/IAvatarStorage';
import { createLogger } from '@/adapters/logging/LoggerFactory';

const logger = createLogger('CloudinaryAvatarStorage');

export class CloudinaryAvatarStorage implements IAvatarStorage {
  constructor() {
    cloudinary.config({
      cloud_name: env.CLOUDINARY_NAME,
      api_key: env.CLOUDINARY_API_KEY,
      api_secret: env.CLOUDINARY_API_SECRET,
      secure: true,
    });
  }

  async upload(file: AvatarUpload): Promise<string> {
    const result = await this.uploadBuffer(file);

    logger.info({ publicId: file.publicId, version: result.version }, 'Avatar uploaded');

    return cloudinary.url(file.publicId, {
      width: AVATAR_LIMITS.SIZE_PX,
      height: AVATAR_LIMITS.SIZE_PX,
      crop: 'fill',
      version: result.version,
    });
  }

  private uploadBuffer(file: AvatarUpload): Promise<UploadApiResponse> {
    return new Promise((resolve, reject) => {
      const stream = cloudinary.uploader.upload_stream(
        { public_id: file.publicId, overwrite: true, resource_type: 'image' },
        (error, result) => {
          if (error) {
            reject(new Error(`Avatar upload failed: ${error.message}`));
            return;
          }
          if (!result) {
            reject(new Error('Avatar upload returned no result'));
            return;
          }
          resolve(result);
        }
      );

      stream.end(file.content);
    });
  }
}

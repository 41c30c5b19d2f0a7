import { Request } from 'express';
import multer from 'multer';
import { AVATAR_LIMITS } from '@/config/businessRules';
import { ValidationError } from '@/errors';

/**
 * Avatar upload: one image in the multipart field "file", kept in memory
 */
export const avatarUpload = multer({
  storage: multer.memoryStorage(),
  limits: {
    fileSize: AVATAR_LIMITS.MAX_FILE_SIZE_BYTES,
    files: 1,
  },
  fileFilter: (_req, file, callback) => {
    if (!file.mimetype.startsWith('image/')) {
      callback(new ValidationError('Avatar must be an image'));
      return;
    }
    callback(null, true);
  },
}).single('file');

export interface UploadedFile {
  content: Buffer;
  mimeType: string;
}

/**
 * The file accepted by avatarUpload, if any
 */
export function uploadedFile(req: Request): UploadedFile | null {
  if (!req.file) return null;
  return { content: req.file.buffer, mimeType: req.file.mimetype };
}

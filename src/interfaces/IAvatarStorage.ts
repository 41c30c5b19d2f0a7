/**
 * Avatar Storage Interface
 *
 * Image hosting for user avatars. The returned URL is what gets stored on the user.
 */
export interface AvatarUpload {
  /** Stable identifier, re-uploads overwrite the previous image */
  publicId: string;
  content: Buffer;
  mimeType: string;
}

export interface IAvatarStorage {
  /**
   * @returns public URL of the stored image, cropped to a square thumbnail
   */
  upload(file: AvatarUpload): Promise<string>;
}

import * as path from 'path';
import { Filename } from '../value-objects/Filename';

/**
 * Kinds of attachment a message can carry
 */
export enum AttachmentKind {
  PHOTO = 'photo',
  DOCUMENT = 'document'
}

/**
 * Media attached to a message in a channel
 */
export class Attachment {
  static readonly MEDIA_DIR = 'media';

  constructor(
    public readonly messageId: number,
    public readonly kind: AttachmentKind,
    public readonly url: string,
    public readonly fileName?: string
  ) {}

  /**
   * Photos are always stored as JPEG; documents keep the extension of their
   * original file name, falling back to .bin
   */
  getFileExtension(): string {
    if (this.kind === AttachmentKind.PHOTO) {
      return '.jpg';
    }
    if (this.fileName) {
      const extension = path.extname(this.fileName);
      if (extension.length > 1) {
        return extension;
      }
    }
    return '.bin';
  }

  getFilename(): Filename {
    return new Filename(`msg_${this.messageId}_${this.kind}${this.getFileExtension()}`);
  }

  /**
   * Path relative to the channel directory, e.g. media/msg_42_photo.jpg
   */
  getMediaPath(): string {
    return `${Attachment.MEDIA_DIR}/${this.getFilename().toString()}`;
  }
}

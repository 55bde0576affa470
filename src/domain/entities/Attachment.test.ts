import { describe, it, expect } from '@jest/globals';
import { Attachment, AttachmentKind } from './Attachment';

describe('Attachment', () => {
  const url = 'https://media.example.test/file';

  it('should store photos as JPEG', () => {
    const photo = new Attachment(42, AttachmentKind.PHOTO, url, 'holiday.png');

    expect(photo.getFileExtension()).toBe('.jpg');
    expect(photo.getFilename().toString()).toBe('msg_42_photo.jpg');
    expect(photo.getMediaPath()).toBe('media/msg_42_photo.jpg');
  });

  it('should keep the extension of a document file name', () => {
    const document = new Attachment(7, AttachmentKind.DOCUMENT, url, 'report.pdf');

    expect(document.getMediaPath()).toBe('media/msg_7_document.pdf');
  });

  it('should use the last extension of a compound one', () => {
    const archive = new Attachment(7, AttachmentKind.DOCUMENT, url, 'backup.tar.gz');

    expect(archive.getFileExtension()).toBe('.gz');
  });

  it('should fall back to .bin without a usable extension', () => {
    expect(new Attachment(1, AttachmentKind.DOCUMENT, url).getFileExtension()).toBe('.bin');
    expect(new Attachment(2, AttachmentKind.DOCUMENT, url, 'README').getFileExtension()).toBe('.bin');
    expect(new Attachment(3, AttachmentKind.DOCUMENT, url, '.bashrc').getFileExtension()).toBe('.bin');
  });
});

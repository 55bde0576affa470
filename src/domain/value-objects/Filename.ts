/**
 * Value object representing a safe filename
 */
export class Filename {
  private static readonly MAX_LENGTH = 255;
  private static readonly RESERVED_CHARS = /[<>:"/\\|?*\x00-\x1f]/g;
  private static readonly RESERVED_NAMES = [
    'CON', 'PRN', 'AUX', 'NUL',
    'COM1', 'COM2', 'COM3', 'COM4', 'COM5', 'COM6', 'COM7', 'COM8', 'COM9',
    'LPT1', 'LPT2', 'LPT3', 'LPT4', 'LPT5', 'LPT6', 'LPT7', 'LPT8', 'LPT9'
  ];

  private readonly value: string;

  constructor(filename: string) {
    if (!filename || filename.trim().length === 0) {
      throw new InvalidFilenameError('Filename cannot be empty');
    }

    this.value = Filename.sanitize(filename);
  }

  /**
   * Get filename as string
   */
  toString(): string {
    return this.value;
  }

  /**
   * Get filename without extension
   */
  getBasename(): string {
    return Filename.splitExtension(this.value)[0];
  }

  /**
   * File extension including the dot, or an empty string
   */
  getExtension(): string {
    return Filename.splitExtension(this.value)[1];
  }

  /**
   * Check equality with another filename
   */
  equals(other: Filename): boolean {
    return this.value === other.value;
  }

  /**
   * Channel titles become directory names through the same rules
   */
  static forDirectory(title: string): Filename {
    return new Filename(title.replace(/\s+/g, ' '));
  }

  /**
   * Replace reserved characters, guard reserved names and cap the length
   */
  private static sanitize(filename: string): string {
    let sanitized = filename.replace(Filename.RESERVED_CHARS, '_');
    sanitized = sanitized.trim().replace(/^\.+|\.+$/g, '');

    const [name, extension] = Filename.splitExtension(sanitized);
    if (Filename.RESERVED_NAMES.includes(name.toUpperCase())) {
      sanitized = '_' + sanitized;
    }

    if (sanitized.length > Filename.MAX_LENGTH) {
      const maxBasenameLength = Filename.MAX_LENGTH - extension.length;
      sanitized = sanitized.substring(0, maxBasenameLength) + extension;
    }

    return sanitized.length === 0 ? 'unnamed' : sanitized;
  }

  /**
   * Split into basename and extension; dotfiles have no extension
   */
  private static splitExtension(filename: string): [string, string] {
    const lastDot = filename.lastIndexOf('.');
    return lastDot > 0
      ? [filename.substring(0, lastDot), filename.substring(lastDot)]
      : [filename, ''];
  }
}

/**
 * Error for invalid filenames
 */
export class InvalidFilenameError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidFilenameError';
  }
}

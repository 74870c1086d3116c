import path from 'path';

/** Bucket used for files whose name carries no extension. */
export const NO_EXTENSION_BUCKET = 'no_extension';

/** Destination used when none is given, resolved against the working directory. */
export const DEFAULT_DESTINATION = 'dist';

/**
 * Lowercased suffix after the final `.` of the base name, without the dot.
 * Dotfiles such as `.bashrc` and names ending in a bare `.` have no extension.
 */
export const extensionOf = (fileName: string): string => {
  const ext = path.extname(path.basename(fileName));
  if (ext.length <= 1) {
    return '';
  }
  return ext.slice(1).toLowerCase();
};

export const bucketNameFor = (fileName: string): string =>
  extensionOf(fileName) || NO_EXTENSION_BUCKET;

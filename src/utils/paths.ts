import fs from "fs-extra";

/**
 * Bare command names ("ffmpeg") are resolved through PATH at spawn time; anything with a
 * separator is a filesystem location we can check up front.
 */
export const looksLikePath = (executable: string): boolean => /[\\/]/.test(executable);

export const executableExists = async (executable: string): Promise<boolean> => {
  if (!executable.trim()) {
    return false;
  }
  if (!looksLikePath(executable)) {
    return true;
  }
  return fs.pathExists(executable);
};

const trimTrailingSeparators = (value: string): string => value.replace(/[\\/]+$/, "");

export const lastPathSegment = (value: string): string => {
  const parts = trimTrailingSeparators(value).split(/[\\/]/);
  return parts[parts.length - 1] ?? "";
};

/** Parent of a Windows or POSIX path without normalising its separators. */
export const parentPath = (value: string): string => {
  const trimmed = trimTrailingSeparators(value);
  const index = Math.max(trimmed.lastIndexOf("/"), trimmed.lastIndexOf("\\"));
  if (index < 0) {
    return trimmed;
  }
  if (index === 0) {
    return trimmed.slice(0, 1);
  }
  const parent = trimmed.slice(0, index);
  // "C:" alone means "current directory on drive C", keep the root separator
  return /^[A-Za-z]:$/.test(parent) ? `${parent}${trimmed[index]}` : parent;
};

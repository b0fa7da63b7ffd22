export const displayError = (err: unknown): string => {
  if (err instanceof Error) {
    return `${err.message}\nStack: ${err.stack}`;
  }
  return String(err);
};

/**
 * Formats a file mode the way `ls -l` shows the permission part, e.g. `0755`.
 */
export const formatMode = (mode: number): string => `0${(mode & 0o7777).toString(8)}`;

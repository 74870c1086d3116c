export const errorCode = (error: unknown): string | undefined => {
  if (error && typeof error === 'object' && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
};

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export const previewText = (text: string, length = 50): string =>
  text.length > length ? `${text.slice(0, length)}...` : text;

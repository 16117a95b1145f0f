/** HTTP status carried by a storage client error (`ApiError.code`), if any. */
export const storageErrorCode = (err: unknown): number | undefined => {
  if (typeof err !== "object" || err === null || !("code" in err)) return undefined;
  return typeof err.code === "number" ? err.code : undefined;
};

export const isNotFound = (err: unknown): boolean => storageErrorCode(err) === 404;

export const isPreconditionFailed = (err: unknown): boolean => storageErrorCode(err) === 412;

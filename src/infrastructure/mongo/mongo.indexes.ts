/**
 * Index plan applied when the watermark collection is first opened.
 * `_id` is the entity name and already unique; the extra index serves
 * operators listing watermarks by recency.
 */
export const mongoIndexes = {
  watermarkCollection: [
    { keys: { updatedAt: -1 }, options: { name: "updatedAt_desc" } }
  ]
} as const;

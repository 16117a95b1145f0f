import type { RawRecord } from "../core/ingestion/batch";
import type { ExtractionWindow } from "../core/ingestion/window";

export type CatalogPage = {
  records: RawRecord[];
  nextCursor?: string;
};

export interface MusicCatalogClient {
  /** One page of `entity` records inside `window`; without a cursor, the first page. */
  fetchPage(entity: string, window: ExtractionWindow, cursor?: string): Promise<CatalogPage>;
  /** Every page of the window, requested again from the first page on each call. */
  pages(entity: string, window: ExtractionWindow): AsyncIterable<RawRecord[]>;
}

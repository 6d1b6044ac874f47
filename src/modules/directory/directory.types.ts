/**
 * Directory Types
 */

export interface DirectoryLocation {
  name: string;
  url: string;
}

/**
 * Question/answer pairs per detail-page section
 */
export type SchoolDetails = Record<string, Record<string, string>>;

/**
 * One school card from a directory listing page
 */
export interface SchoolCard {
  name?: string;
  url?: string;
  description?: string;
  curriculum?: string;
  language?: string;
  ages?: string;
  fees?: string;
  location?: string;
  details?: SchoolDetails;
}

export interface EnrichOptions {
  /**
   * Called with the full card list every `saveEvery` cards and once at the end
   */
  persist: (cards: SchoolCard[]) => Promise<void>;
  saveEvery?: number;
  delayBetweenRequests?: number;
  fetchDetails?: (url: string) => Promise<SchoolDetails | null>;
  sleeper?: (ms: number) => Promise<void>;
}

export interface DirectoryScrapeOptions {
  fetcher?: (url: string) => Promise<string | null>;
  delayBetweenRequests?: number;
  sleeper?: (ms: number) => Promise<void>;
  baseUrl?: string;
}

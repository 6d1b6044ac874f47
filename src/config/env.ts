import dotenv from 'dotenv';

dotenv.config();

export const env = {
  NODE_ENV: process.env.NODE_ENV || 'development',

  // Fetching
  USER_AGENT:
    process.env.USER_AGENT ||
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
  ACCEPT_LANGUAGE: process.env.ACCEPT_LANGUAGE || 'en-US,en;q=0.5',
  HTTP_TIMEOUT: parseInt(process.env.HTTP_TIMEOUT || '10000', 10), // 10s per request

  // Crawling
  CRAWL_MAX_PAGES: parseInt(process.env.CRAWL_MAX_PAGES || '10', 10),
  REQUEST_DELAY_MS: parseInt(process.env.REQUEST_DELAY_MS || '1000', 10), // politeness delay after every fetch
  CRAWL_DEDUPE_PENDING: process.env.CRAWL_DEDUPE_PENDING === 'true', // Default false

  // Directory scraping
  DIRECTORY_BASE_URL: process.env.DIRECTORY_BASE_URL || 'https://www.international-schools-database.com',
  DIRECTORY_DELAY_MS: parseInt(process.env.DIRECTORY_DELAY_MS || '2000', 10),
  DETAIL_DELAY_MS: parseInt(process.env.DETAIL_DELAY_MS || '12000', 10),
  DETAIL_MAX_RETRIES: parseInt(process.env.DETAIL_MAX_RETRIES || '3', 10),
  DETAIL_RETRY_BASE: parseInt(process.env.DETAIL_RETRY_BASE || '5000', 10), // 5s, then 10s
  DETAIL_SAVE_EVERY: parseInt(process.env.DETAIL_SAVE_EVERY || '3', 10),

  // Files
  SEEDS_FILE: process.env.SEEDS_FILE || 'urls.json',
  SCRAPED_OUTPUT_FILE: process.env.SCRAPED_OUTPUT_FILE || 'scraped_output.json',
  NORMALIZED_OUTPUT_FILE: process.env.NORMALIZED_OUTPUT_FILE || 'normalized_output.json',
  DIRECTORY_EN_FILE: process.env.DIRECTORY_EN_FILE || 'japanese_schools_output.json',
  DIRECTORY_JP_FILE: process.env.DIRECTORY_JP_FILE || 'japanese_schools_output_jp.json',
  BILINGUAL_OUTPUT_FILE: process.env.BILINGUAL_OUTPUT_FILE || 'normalized_japanese_schools.json',
} as const;

export default env;

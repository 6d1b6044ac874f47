import type { DirectoryLocation } from './directory.types';
import { env } from '../../config/env';

const CITY_SLUGS: ReadonlyArray<[name: string, slug: string]> = [
  ['Tokyo', 'tokyo'],
  ['Kyoto-Osaka-Kobe', 'kyoto-osaka-kobe'],
  ['Nagoya', 'nagoya'],
  ['Tsukuba', 'tsukuba'],
  ['Nagano', 'nagano'],
  ['Sapporo', 'sapporo-hokkaido'],
  ['Okinawa', 'okinawa'],
  ['Sendai', 'sendai'],
  ['Hiroshima', 'hiroshima'],
  ['Fukuoka', 'fukuoka'],
  ['Appi Kogen', 'appi-kogen'],
  ['Kofu', 'kofu'],
];

export function getJapanLocations(baseUrl: string = env.DIRECTORY_BASE_URL): DirectoryLocation[] {
  return CITY_SLUGS.map(([name, slug]) => ({ name, url: `${baseUrl}/in/${slug}` }));
}

import { Extractor } from '../types/listing';
import { extractFunda } from './funda';
import { extractPararius } from './pararius';

export type SiteName = 'pararius' | 'funda';

export const EXTRACTORS: Record<SiteName, Extractor> = {
  pararius: extractPararius,
  funda: extractFunda
};

export { extractFunda, extractPararius };

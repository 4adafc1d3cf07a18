import { AppConfig, hasTwilioCredentials } from '../config/env';
import { ChangeDetector } from '../core/ChangeDetector';
import { StructuredLogger } from '../core/StructuredLogger';
import { EXTRACTORS, SiteName } from '../extractors';
import { SmsService } from '../notify/SmsService';
import { SeenStore } from '../store/SeenStore';
import { ListingPoller } from './ListingPoller';
import { PageFetcher } from './PageFetcher';

export interface SiteMonitor {
  name: SiteName;
  sources: string[];
  dataFile: string;
  poller: ListingPoller;
}

const SITE_LABELS: Record<SiteName, string> = {
  pararius: 'P!',
  funda: 'F!'
};

/**
 * Sources et fichier d'état d'un site selon la configuration
 */
export function siteSettings(site: SiteName, config: AppConfig): { sources: string[]; dataFile: string } {
  if (site === 'pararius') {
    return { sources: [...config.PARARIUS_URLS], dataFile: config.PARARIUS_DATA_FILE };
  }
  return { sources: config.FUNDA_URL ? [config.FUNDA_URL] : [], dataFile: config.FUNDA_DATA_FILE };
}

/**
 * Assemble un moniteur indépendant: son propre seen set, son fichier, sa boucle
 */
export function createSiteMonitor(site: SiteName, config: AppConfig, logger: StructuredLogger): SiteMonitor | null {
  const { sources, dataFile } = siteSettings(site, config);
  if (sources.length === 0) {
    logger.info(`ℹ️ ${site} monitor not started (no URL configured)`);
    return null;
  }

  const fetcher = new PageFetcher({ timeoutMs: config.FETCH_TIMEOUT_MS });
  const notifier = new SmsService(logger, {
    enabled: config.SMS_ENABLED && hasTwilioCredentials(config),
    accountSid: config.TWILIO_ACCOUNT_SID,
    authToken: config.TWILIO_AUTH_TOKEN,
    fromNumber: config.TWILIO_FROM_NUMBER,
    toNumber: config.NOTIFICATION_NUMBER,
    label: SITE_LABELS[site]
  });

  const poller = new ListingPoller(
    {
      name: site,
      sources,
      intervalMs: config.CHECK_INTERVAL_S * 1000,
      jitterFraction: config.JITTER_FRACTION,
      politeDelayMinMs: config.POLITE_DELAY_MIN_MS,
      politeDelayMaxMs: config.POLITE_DELAY_MAX_MS,
      dumpDir: config.DUMP_DIR
    },
    {
      store: new SeenStore(dataFile, logger),
      detector: new ChangeDetector(logger),
      extractor: EXTRACTORS[site],
      fetchPage: (url, signal) => fetcher.fetch(url, signal),
      notifier,
      logger
    }
  );

  return { name: site, sources, dataFile, poller };
}

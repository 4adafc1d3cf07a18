/**
 * Configuration centralisée des variables d'environnement
 * Supporte les formats booléens multiples et validation des valeurs critiques
 */

// Helpers pour parser les valeurs
export const toBool = (value?: string, defaultValue: boolean = false): boolean => {
  if (value == null || value.trim() === '') return defaultValue;
  return /^(1|true|yes|y|on)$/i.test(value.trim());
};

export const toNumber = (value?: string, defaultValue: number = 0): number => {
  if (!value) return defaultValue;
  const parsed = parseFloat(value);
  return isNaN(parsed) ? defaultValue : parsed;
};

export const toString = (value?: string, defaultValue: string = ''): string => {
  return value?.trim() || defaultValue;
};

export const MAX_PARARIUS_URLS = 20;

/**
 * Récupère PARARIUS_SEARCH_URL_1..20 (numérotation non continue acceptée)
 */
export function collectParariusUrls(env: NodeJS.ProcessEnv = process.env): string[] {
  const urls: string[] = [];
  for (let i = 1; i <= MAX_PARARIUS_URLS; i++) {
    const url = toString(env[`PARARIUS_SEARCH_URL_${i}`]);
    if (url) {
      urls.push(url);
    }
  }
  return urls;
}

export function buildConfig(env: NodeJS.ProcessEnv = process.env) {
  return {
    // Environnement
    NODE_ENV: toString(env.NODE_ENV, 'development'),
    LOG_LEVEL: toString(env.LOG_LEVEL, 'info'),
    LOG_FORMAT: toString(env.LOG_FORMAT, env.NODE_ENV === 'production' ? 'json' : 'pretty'),

    // Serveur de statut
    PORT: toNumber(env.PORT, 5000),

    // Sources surveillées
    PARARIUS_URLS: collectParariusUrls(env),
    FUNDA_URL: toString(env.FUNDA_SEARCH_URL),

    // Polling
    CHECK_INTERVAL_RAW: toString(env.CHECK_INTERVAL),
    CHECK_INTERVAL_S: toNumber(env.CHECK_INTERVAL, 900), // 15 min
    JITTER_FRACTION: toNumber(env.JITTER_FRACTION, 0.1), // ±10%
    FETCH_TIMEOUT_MS: toNumber(env.FETCH_TIMEOUT_MS, 20000),
    POLITE_DELAY_MIN_MS: toNumber(env.POLITE_DELAY_MIN_MS, 1000),
    POLITE_DELAY_MAX_MS: toNumber(env.POLITE_DELAY_MAX_MS, 3000),

    // Persistance
    PARARIUS_DATA_FILE: toString(env.PARARIUS_DATA_FILE, 'seen_listings.json'),
    FUNDA_DATA_FILE: toString(env.FUNDA_DATA_FILE, 'seen_funda_listings.json'),
    DUMP_DIR: toString(env.DUMP_DIR),

    // Twilio (SMS)
    SMS_ENABLED: toBool(env.ENABLE_SMS, true),
    TWILIO_ACCOUNT_SID: toString(env.TWILIO_ACCOUNT_SID),
    TWILIO_AUTH_TOKEN: toString(env.TWILIO_AUTH_TOKEN),
    TWILIO_FROM_NUMBER: toString(env.TWILIO_FROM_NUMBER),
    NOTIFICATION_NUMBER: toString(env.NOTIFICATION_NUMBER),
  } as const;
}

export type AppConfig = ReturnType<typeof buildConfig>;

// Configuration principale
export const CONFIG: AppConfig = buildConfig();

export function hasTwilioCredentials(config: AppConfig = CONFIG): boolean {
  return !!(config.TWILIO_ACCOUNT_SID && config.TWILIO_AUTH_TOKEN && config.TWILIO_FROM_NUMBER && config.NOTIFICATION_NUMBER);
}

// Validation de la configuration
export function validateConfig(config: AppConfig = CONFIG): { isValid: boolean; errors: string[]; warnings: string[] } {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (config.PARARIUS_URLS.length === 0 && !config.FUNDA_URL) {
    errors.push('At least one search URL (PARARIUS_SEARCH_URL_X or FUNDA_SEARCH_URL) must be defined');
  }

  if (!config.CHECK_INTERVAL_RAW) {
    errors.push('CHECK_INTERVAL is missing');
  } else if (!/^\d+$/.test(config.CHECK_INTERVAL_RAW) || config.CHECK_INTERVAL_S <= 0) {
    errors.push('CHECK_INTERVAL must be a positive integer (seconds)');
  }

  if (config.JITTER_FRACTION < 0 || config.JITTER_FRACTION >= 1) {
    errors.push('JITTER_FRACTION must be between 0 and 1');
  }

  if (config.FETCH_TIMEOUT_MS <= 0) {
    errors.push('FETCH_TIMEOUT_MS must be > 0');
  }

  if (config.POLITE_DELAY_MIN_MS < 0 || config.POLITE_DELAY_MAX_MS < config.POLITE_DELAY_MIN_MS) {
    errors.push('POLITE_DELAY_MIN_MS/POLITE_DELAY_MAX_MS must form a valid range');
  }

  // Twilio manquant: le moniteur tourne en mode observateur
  if (config.SMS_ENABLED && !hasTwilioCredentials(config)) {
    warnings.push('Twilio settings incomplete - SMS notifications will NOT be sent');
  }

  return {
    isValid: errors.length === 0,
    errors,
    warnings
  };
}

// Résumé de la configuration (sans secrets)
export function getConfigSummary(config: AppConfig = CONFIG): Record<string, string | number | boolean> {
  return {
    NODE_ENV: config.NODE_ENV,
    PORT: config.PORT,
    PARARIUS_URLS: config.PARARIUS_URLS.length,
    FUNDA_ENABLED: !!config.FUNDA_URL,
    CHECK_INTERVAL_S: config.CHECK_INTERVAL_S,
    JITTER_FRACTION: config.JITTER_FRACTION,
    FETCH_TIMEOUT_MS: config.FETCH_TIMEOUT_MS,
    PARARIUS_DATA_FILE: config.PARARIUS_DATA_FILE,
    FUNDA_DATA_FILE: config.FUNDA_DATA_FILE,
    SMS_ENABLED: config.SMS_ENABLED && hasTwilioCredentials(config),
  };
}

// Log de la configuration au démarrage
export function logConfigSummary(config: AppConfig = CONFIG): void {
  const summary = getConfigSummary(config);

  console.log('🔧 Monitor configuration:');
  console.log(`  📍 Environment: ${summary.NODE_ENV}`);
  console.log(`  🌐 Port: ${summary.PORT}`);
  console.log(`  🏠 Pararius URLs: ${summary.PARARIUS_URLS}`);
  console.log(`  🏡 Funda: ${summary.FUNDA_ENABLED ? '✅' : '❌'}`);
  console.log(`  ⏱️ Interval: ${summary.CHECK_INTERVAL_S}s (±${Number(summary.JITTER_FRACTION) * 100}%)`);
  console.log(`  📱 SMS: ${summary.SMS_ENABLED ? '✅' : '❌'}`);
}

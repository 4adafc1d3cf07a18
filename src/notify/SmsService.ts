import axios from 'axios';
import { NotificationError, describeError } from '../core/errors';
import { StructuredLogger } from '../core/StructuredLogger';
import { ListingSnapshot, Notifier } from '../types/listing';

export interface SmsConfig {
  enabled: boolean;
  accountSid: string;
  authToken: string;
  fromNumber: string;
  toNumber: string;
  baseUrl: string;
  timeoutMs: number;
  label: string; // en-tête du message, ex: "Pararius"
}

// Longueur max d'un SMS concaténé côté Twilio
export const MAX_SMS_LENGTH = 1600;

/**
 * Envoie une annonce par SMS via l'API REST Twilio.
 * Ne lève jamais: l'échec est retourné (false) et loggé.
 */
export class SmsService implements Notifier {
  private readonly config: SmsConfig;
  private readonly logger: StructuredLogger;
  private sentCount: number = 0;
  private failedCount: number = 0;

  constructor(logger: StructuredLogger, config: Partial<SmsConfig> = {}) {
    this.config = {
      enabled: true,
      accountSid: '',
      authToken: '',
      fromNumber: '',
      toNumber: '',
      baseUrl: 'https://api.twilio.com/2010-04-01',
      timeoutMs: 10000,
      label: 'New listing',
      ...config
    };
    this.logger = logger.child(`SmsService:${this.config.label}`);

    if (!this.isObserverMode()) {
      this.logger.info(`📱 SMS notifications enabled to ${maskNumber(this.config.toNumber)}`);
    } else {
      this.logger.warn('⚠️ Twilio settings incomplete or SMS disabled - observer mode, no SMS will be sent');
    }
  }

  // Mode observateur: identifiants incomplets ou SMS désactivés
  isObserverMode(): boolean {
    const { enabled, accountSid, authToken, fromNumber, toNumber } = this.config;
    return !enabled || !accountSid || !authToken || !fromNumber || !toNumber;
  }

  formatMessage(listing: ListingSnapshot): string {
    const body =
      `🏠 ${this.config.label}\n\n` +
      `📌 ${listing.title}\n` +
      `📍 ${listing.address}\n` +
      `💰 ${listing.price}\n\n` +
      `🔗 ${listing.url}`;

    // Découpe par caractère Unicode pour ne jamais couper un emoji en deux
    const chars = Array.from(body);
    return chars.length > MAX_SMS_LENGTH ? `${chars.slice(0, MAX_SMS_LENGTH - 3).join('')}...` : body;
  }

  async notify(listing: ListingSnapshot): Promise<boolean> {
    if (this.isObserverMode()) {
      this.logger.warn(`ℹ️ SMS skipped (observer mode): ${listing.title}`, { key: listing.key });
      this.failedCount++;
      return false;
    }

    try {
      const sid = await this.send(this.formatMessage(listing));
      this.sentCount++;
      this.logger.info(`✅ SMS sent for ${listing.title}`, { key: listing.key, sid });
      return true;
    } catch (error) {
      this.failedCount++;
      this.logger.error(`❌ SMS failed for ${listing.title}: ${describeError(error)}`, undefined, { key: listing.key });
      return false;
    }
  }

  getStatus(): { observerMode: boolean; sent: number; failed: number } {
    return {
      observerMode: this.isObserverMode(),
      sent: this.sentCount,
      failed: this.failedCount
    };
  }

  private async send(body: string): Promise<string> {
    const url = `${this.config.baseUrl}/Accounts/${this.config.accountSid}/Messages.json`;
    const form = new URLSearchParams({
      To: this.config.toNumber,
      From: this.config.fromNumber,
      Body: body
    });

    try {
      const response = await axios.post<{ sid?: string; status?: string }>(url, form.toString(), {
        auth: { username: this.config.accountSid, password: this.config.authToken },
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
        timeout: this.config.timeoutMs
      });
      return response.data.sid || 'unknown';
    } catch (error) {
      if (axios.isAxiosError(error)) {
        const status = error.response?.status;
        throw new NotificationError(status ? `Twilio HTTP ${status}` : 'Twilio request failed', status, error);
      }
      throw new NotificationError('Twilio request failed', undefined, error);
    }
  }
}

function maskNumber(number: string): string {
  return number.length > 4 ? `${'*'.repeat(number.length - 4)}${number.slice(-4)}` : number;
}

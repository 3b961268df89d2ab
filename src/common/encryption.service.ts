import { Inject, Injectable, Logger } from '@nestjs/common';
import * as CryptoJS from 'crypto-js';
import { PIPELINE_SETTINGS, PipelineSettings, requireSetting } from '../config/pipeline-settings';

@Injectable()
export class EncryptionService {
  private readonly logger = new Logger(EncryptionService.name);
  private warnedWeakKey = false;

  constructor(@Inject(PIPELINE_SETTINGS) private readonly settings: PipelineSettings) {}

  private secretKey(): string {
    const key = requireSetting(this.settings, 'CREDENTIALS_ENCRYPTION_SECRET');
    if (key.length < 32 && !this.warnedWeakKey) {
      this.warnedWeakKey = true;
      this.logger.warn('CREDENTIALS_ENCRYPTION_SECRET appears weak. Consider using a longer, more random key.');
    }
    return key;
  }

  /**
   * Encrypts a JSON object.
   * @returns Encrypted string (Base64 encoded).
   */
  encrypt(data: Record<string, unknown>): string {
    const jsonString = JSON.stringify(data);
    const encrypted = CryptoJS.AES.encrypt(jsonString, this.secretKey()).toString();
    return Buffer.from(encrypted).toString('base64');
  }

  /**
   * Decrypts a Base64 encoded string back into its JSON value. Callers validate the shape.
   */
  decrypt(encryptedDataBase64: string): unknown {
    const key = this.secretKey();
    let jsonString: string;
    try {
      const encryptedData = Buffer.from(encryptedDataBase64, 'base64').toString('utf-8');
      jsonString = CryptoJS.AES.decrypt(encryptedData, key).toString(CryptoJS.enc.Utf8);
    } catch (error) {
      // Wrong key or corrupted input surfaces as a malformed UTF-8 error from crypto-js.
      throw new Error(`Failed to decrypt credentials: ${error instanceof Error ? error.message : String(error)}`);
    }
    if (!jsonString) {
      throw new Error('Failed to decrypt credentials: empty result after decryption.');
    }
    try {
      return JSON.parse(jsonString);
    } catch {
      throw new Error('Failed to decrypt credentials: result is not JSON.');
    }
  }
}

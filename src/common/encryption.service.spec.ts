import { ConfigurationError } from '../common/errors';
import { createTestSettings } from '../config/testing/test-settings';
import { EncryptionService } from './encryption.service';

describe('EncryptionService', () => {
  it('round-trips a credentials object', () => {
    const service = new EncryptionService(createTestSettings());

    const sealed = service.encrypt({ accessToken: 'access-1', refreshToken: 'refresh-1' });

    expect(sealed).not.toContain('access-1');
    expect(service.decrypt(sealed)).toEqual({ accessToken: 'access-1', refreshToken: 'refresh-1' });
  });

  it('fails to decrypt with a different secret', () => {
    const sealed = new EncryptionService(createTestSettings()).encrypt({ accessToken: 'a' });
    const other = new EncryptionService(createTestSettings({ encryptionSecret: 'another-test-secret' }));

    expect(() => other.decrypt(sealed)).toThrow('Failed to decrypt credentials');
  });

  it('requires the encryption secret', () => {
    const service = new EncryptionService({ ...createTestSettings(), encryptionSecret: undefined });

    expect(() => service.encrypt({ accessToken: 'a' })).toThrow(ConfigurationError);
  });
});

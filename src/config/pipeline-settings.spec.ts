import { ConfigurationError } from '../common/errors';
import { parseCommissionTiers } from './pipeline-settings';

describe('parseCommissionTiers', () => {
  it('treats an unset value as no tiers', () => {
    expect(parseCommissionTiers(undefined)).toEqual([]);
  });

  it('reads bounded and open-ended tiers', () => {
    expect(parseCommissionTiers('[{"max":100,"rate":0.18},{"rate":0.1}]')).toEqual([
      { max: 100, rate: 0.18 },
      { max: null, rate: 0.1 },
    ]);
  });

  it('rejects malformed tiers', () => {
    expect(() => parseCommissionTiers('{"max":100}')).toThrow('MARKETPLACE_COMMISSION_TIERS must be a JSON array');
    expect(() => parseCommissionTiers('[{"max":100,"rate":1.5}]')).toThrow(
      'MARKETPLACE_COMMISSION_TIERS[0] needs a rate between 0 and 1',
    );
    expect(() => parseCommissionTiers('[{"max":"high","rate":0.1}]')).toThrow(ConfigurationError);
    expect(() => parseCommissionTiers('[{')).toThrow(/is not valid JSON/);
  });
});

import {
  APPLICATION_NAME,
  EMAIL_CONFIG,
  FRONTEND_BASE_URL,
  getDomainConfig,
  getFrontendUrl,
  PRIMARY_DOMAIN,
} from '../../../src/config/domain';

describe('Domain Configuration', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
    delete process.env['FRONTEND_URL'];
    delete process.env['SES_FROM_EMAIL'];
  });

  afterAll(() => {
    process.env = originalEnv;
  });

  describe('constants', () => {
    it('should derive URLs and addresses from the primary domain', () => {
      expect(PRIMARY_DOMAIN).toBe('courtalerts.example');
      expect(FRONTEND_BASE_URL).toBe('https://courtalerts.example');
      expect(EMAIL_CONFIG.fromAddress).toBe('alerts@courtalerts.example');
      expect(EMAIL_CONFIG.fromName).toBe(APPLICATION_NAME);
    });
  });

  describe('getFrontendUrl', () => {
    it('should join a path onto the default base URL', () => {
      expect(getFrontendUrl('/alerts/sub-1')).toBe('https://courtalerts.example/alerts/sub-1');
    });

    it('should add a missing leading slash', () => {
      expect(getFrontendUrl('alerts/sub-1')).toBe('https://courtalerts.example/alerts/sub-1');
    });

    it('should trim trailing slashes from a custom base URL', () => {
      expect(getFrontendUrl('/alerts', 'http://localhost:3000//')).toBe('http://localhost:3000/alerts');
    });
  });

  describe('getDomainConfig', () => {
    it('should use the defaults without overrides', () => {
      expect(getDomainConfig()).toEqual({
        frontendUrl: 'https://courtalerts.example',
        fromEmail: 'alerts@courtalerts.example',
        applicationName: 'Court Alerts',
      });
    });

    it('should honour environment overrides', () => {
      process.env['FRONTEND_URL'] = 'http://localhost:3000';
      process.env['SES_FROM_EMAIL'] = 'dev@localhost.test';

      expect(getDomainConfig()).toMatchObject({
        frontendUrl: 'http://localhost:3000',
        fromEmail: 'dev@localhost.test',
      });
    });
  });
});

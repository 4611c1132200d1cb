import { describe, expect, it } from 'vitest';
import { Effect } from 'effect';
import {
  makeSiteInfoConfig,
  SiteInfoConfig,
  validateSiteInfoConfig,
} from '../../../lib/Config/SiteInfoConfig.service.js';
import { SITE_INFO_SELECTORS } from '../../../lib/Selectors/Selectors.js';
import { expectFailure, expectSuccess } from '../../infrastructure/EffectTestUtils.js';

describe('SiteInfoConfig Service', () => {
  describe('makeSiteInfoConfig', () => {
    it('should use defaults when no options are given', async () => {
      const config = makeSiteInfoConfig();
      const options = await expectSuccess(config.getOptions());

      expect(options.urlTemplate).toBe('https://www.alexa.com/siteinfo/{domain}');
      expect(options.userAgent).toBe('SiteInfoParser/1.0');
      expect(options.requestTimeoutMs).toBe(30000);
      expect(options.extractionMode).toBe('fail-fast');
      expect(await expectSuccess(config.getSelectors())).toEqual(SITE_INFO_SELECTORS);
    });

    it('should merge custom options with defaults', async () => {
      const config = makeSiteInfoConfig({
        userAgent: 'TestAgent/2.0',
        headers: { 'Accept-Language': 'de' },
        extractionMode: 'collect-all',
      });

      expect(await expectSuccess(config.getUserAgent())).toBe('TestAgent/2.0');
      expect(await expectSuccess(config.getHeaders())).toEqual({
        'Accept-Language': 'de',
      });
      expect(await expectSuccess(config.getExtractionMode())).toBe('collect-all');
      expect(await expectSuccess(config.getRequestTimeout())).toBe(30000);
    });

    it('should interpolate the domain into the URL template', async () => {
      const config = makeSiteInfoConfig({
        urlTemplate: 'http://stats.test/info/{domain}?lang=en',
      });
      expect(await expectSuccess(config.getSiteInfoUrl(' example.com '))).toBe(
        'http://stats.test/info/example.com?lang=en'
      );
    });

    it('should escape characters that do not belong in a path segment', async () => {
      const config = makeSiteInfoConfig();
      expect(await expectSuccess(config.getSiteInfoUrl('a/b c'))).toBe(
        'https://www.alexa.com/siteinfo/a%2Fb%20c'
      );
    });

    it('should apply selector overrides', async () => {
      const config = makeSiteInfoConfig({
        selectorOverrides: { title: 'h1' },
      });
      const selectors = await expectSuccess(config.getSelectors());
      expect(selectors.title).toBe('h1');
      expect(selectors.description).toBe(SITE_INFO_SELECTORS.description);
    });
  });

  describe('validateSiteInfoConfig', () => {
    it('should reject a URL template without a domain placeholder', async () => {
      const error = await expectFailure(
        validateSiteInfoConfig({ urlTemplate: 'https://stats.test/info' })
      );
      expect(error).toMatchObject({
        _tag: 'ConfigurationError',
        message: 'urlTemplate must contain {domain}',
      });
    });

    it('should reject a non-positive timeout', async () => {
      const error = await expectFailure(
        validateSiteInfoConfig({ requestTimeoutMs: 0 })
      );
      expect(error.message).toBe('requestTimeoutMs must be a positive number');
    });

    it('should reject blank selector overrides', async () => {
      const error = await expectFailure(
        validateSiteInfoConfig({
          selectorOverrides: { title: ' ', mainCountry: 'x' },
        })
      );
      expect(error.message).toBe('Empty selector override for: title');
    });

    it('should reject overrides for fields that have no selector', async () => {
      // Options often come from untyped sources such as JSON files
      const fromFile = { country: 'span.country' };
      const error = await expectFailure(
        validateSiteInfoConfig({
          selectorOverrides: { title: 'h1', ...fromFile },
        })
      );
      expect(error).toMatchObject({
        _tag: 'ConfigurationError',
        message: 'Unknown selector override for: country',
      });
    });

    it('should reject overrides that are not valid CSS', async () => {
      const error = await expectFailure(
        validateSiteInfoConfig({ selectorOverrides: { title: 'div[' } })
      );
      expect(error).toMatchObject({
        _tag: 'ConfigurationError',
        message: "Invalid selector override for title: 'div['",
      });
    });

    it('should accept valid overrides unchanged', async () => {
      const options = { selectorOverrides: { title: 'h1.site-title' } };
      expect(await expectSuccess(validateSiteInfoConfig(options))).toBe(options);
    });
  });

  describe('SiteInfoConfig layers', () => {
    it('should provide defaults through the Default layer', async () => {
      const mode = await expectSuccess(
        Effect.gen(function* () {
          const config = yield* SiteInfoConfig;
          return yield* config.getExtractionMode();
        }).pipe(Effect.provide(SiteInfoConfig.Default))
      );
      expect(mode).toBe('fail-fast');
    });

    it('should fail the Live layer on invalid options', async () => {
      const error = await expectFailure(
        Effect.gen(function* () {
          const config = yield* SiteInfoConfig;
          return yield* config.getOptions();
        }).pipe(Effect.provide(SiteInfoConfig.Live({ requestTimeoutMs: -1 })))
      );
      expect(error._tag).toBe('ConfigurationError');
    });

    it('should accept a ready-made service in the Live layer', async () => {
      const agent = await expectSuccess(
        Effect.gen(function* () {
          const config = yield* SiteInfoConfig;
          return yield* config.getUserAgent();
        }).pipe(
          Effect.provide(
            SiteInfoConfig.Live(makeSiteInfoConfig({ userAgent: 'Prebuilt/1.0' }))
          )
        )
      );
      expect(agent).toBe('Prebuilt/1.0');
    });
  });
});

// Tests for configuration loading

import { describe, it, expect } from 'vitest';
import { DEFAULT_DOMAIN_CONFIG, loadDomainConfig } from './config.js';
import { ValidationError } from './errors.js';

describe('loadDomainConfig', () => {
  it('uses defaults when nothing is set', () => {
    expect(loadDomainConfig({})).toEqual(DEFAULT_DOMAIN_CONFIG);
  });

  it('reads every variable', () => {
    expect(
      loadDomainConfig({
        PLINTH_TYPE_CACHE_CAPACITY: '64',
        PLINTH_PROXY_NAMESPACE: 'Castle.Proxies',
        PLINTH_ACCESSOR_COMPILATION: 'disabled',
        PLINTH_SPAN_INLINE_LIMIT: '0',
      })
    ).toEqual({
      typeCacheCapacity: 64,
      proxyNamespace: 'Castle.Proxies',
      accessorCompilation: false,
      spanInlineLimit: 0,
    });
  });

  it('rejects invalid values', () => {
    expect(() => loadDomainConfig({ PLINTH_TYPE_CACHE_CAPACITY: '0' })).toThrow(ValidationError);
    expect(() => loadDomainConfig({ PLINTH_ACCESSOR_COMPILATION: 'sometimes' })).toThrow(
      /PLINTH_ACCESSOR_COMPILATION/
    );
    expect(() => loadDomainConfig({ PLINTH_SPAN_INLINE_LIMIT: '17' })).toThrow(ValidationError);
  });
});

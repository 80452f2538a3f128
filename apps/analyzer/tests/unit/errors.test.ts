import { describe, expect, it } from 'vitest';

import { ConfigurationError, MalformedMatchError, MatchDigestError } from '../../src/utils/errors.js';

describe('errors', () => {
  it('names the field path in malformed match errors', () => {
    const error = new MalformedMatchError('innings[0].overs', 'overs list is missing');

    expect(error).toBeInstanceOf(MatchDigestError);
    expect(error.name).toBe('MalformedMatchError');
    expect(error.message).toBe('Malformed match record at innings[0].overs: overs list is missing');
    expect(error.fieldPath).toBe('innings[0].overs');
    expect(error.reason).toBe('overs list is missing');
  });

  it('keeps subclass names', () => {
    expect(new ConfigurationError('bad').name).toBe('ConfigurationError');
    expect(new MatchDigestError('bad').name).toBe('MatchDigestError');
  });
});

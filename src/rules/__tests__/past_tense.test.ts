import { describe, it, expect } from 'vitest';
import { createPastTenseCheck, eventBaseName, loadIrregularPastTense, splitIdentifier } from '../past_tense.js';

describe('splitIdentifier', () => {
  it('splits PascalCase and acronyms', () => {
    expect(splitIdentifier('UserEmailChanged')).toEqual(['User', 'Email', 'Changed']);
    expect(splitIdentifier('HTTPRequestSent')).toEqual(['HTTP', 'Request', 'Sent']);
    expect(splitIdentifier('orderId')).toEqual(['order', 'Id']);
  });

  it('returns no words for an empty name', () => {
    expect(splitIdentifier('')).toEqual([]);
  });
});

describe('eventBaseName', () => {
  it('drops a trailing Event', () => {
    expect(eventBaseName('OrderPlacedEvent')).toBe('OrderPlaced');
  });

  it('keeps a name that is only Event', () => {
    expect(eventBaseName('Event')).toBe('Event');
  });
});

describe('createPastTenseCheck', () => {
  const isPastTense = createPastTenseCheck();

  it('accepts regular -ed forms', () => {
    expect(isPastTense('Changed')).toBe(true);
    expect(isPastTense('Placed')).toBe(true);
  });

  it('accepts irregular forms from the built-in list', () => {
    expect(loadIrregularPastTense().has('sent')).toBe(true);
    expect(isPastTense('Sent')).toBe(true);
    expect(isPastTense('Paid')).toBe(true);
  });

  it('rejects present-tense words', () => {
    expect(isPastTense('Change')).toBe(false);
    expect(isPastTense('Pay')).toBe(false);
    expect(isPastTense('Ed')).toBe(false);
  });

  it('accepts configured extra words case-insensitively', () => {
    const withExtras = createPastTenseCheck(['Onboarded', 'Rekt']);

    expect(withExtras('rekt')).toBe(true);
    expect(isPastTense('Rekt')).toBe(false);
  });
});

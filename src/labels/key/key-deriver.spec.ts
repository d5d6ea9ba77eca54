import { ConfigService } from '@nestjs/config';
import { KeyDeriver, normalizeDefaultText, slug } from './key-deriver';
import { labelRef } from './label-ref';

describe('KeyDeriver', () => {
  const deriver = new KeyDeriver();

  it('builds the key from namespace, category and text slugs', () => {
    expect(deriver.derive('travel-bot', 'booking', 'Your trip is booked!')).toEqual({
      namespace: 'travel-bot',
      key: 'travel_bot_booking_your_trip_is_booked',
    });
  });

  it('is deterministic', () => {
    const first = deriver.derive('ns', 'greetings', 'Hello there');
    const second = deriver.derive('ns', 'greetings', 'Hello there');
    expect(second).toEqual(first);
  });

  it('uses an explicit key verbatim', () => {
    expect(deriver.derive('ns', 'cat', 'Hello', 'greeting.Main')).toEqual({
      namespace: 'ns',
      key: 'greeting.Main',
    });
  });

  it('collapses texts that differ only in interpolated values', () => {
    const placeholder = deriver.derive('ns', 'inbox', 'You have {0} new messages');
    const literal = deriver.derive('ns', 'inbox', 'You have 3 new messages');
    const other = deriver.derive('ns', 'inbox', 'You have 42 new messages');

    expect(placeholder.key).toBe('ns_inbox_you_have_new_messages');
    expect(literal).toEqual(placeholder);
    expect(other).toEqual(placeholder);
  });

  it('keeps distinct texts apart', () => {
    const a = deriver.derive('ns', 'cat', 'Good morning');
    const b = deriver.derive('ns', 'cat', 'Good evening');
    expect(a.key).not.toBe(b.key);
  });

  it('keeps category in the key', () => {
    const a = deriver.derive('ns', 'booking', 'Done');
    const b = deriver.derive('ns', 'payment', 'Done');
    expect(a.key).toBe('ns_booking_done');
    expect(b.key).toBe('ns_payment_done');
  });

  it('keeps non latin letters', () => {
    expect(deriver.derive('ns', 'cat', 'Réservé à 20h').key).toBe(
      'ns_cat_réservé_à_h',
    );
  });

  it('appends a hash suffix when the text is truncated', () => {
    const longA = 'a'.repeat(150);
    const longB = 'a'.repeat(140) + ' bbbbbbbbbb';

    const keyA = deriver.derive('ns', 'cat', longA).key;
    const keyB = deriver.derive('ns', 'cat', longB).key;
    const textPartA = keyA.slice('ns_cat_'.length);

    expect(textPartA).toHaveLength(100);
    expect(textPartA).toMatch(/^a{91}_[0-9a-f]{8}$/);
    expect(keyA).not.toBe(keyB);
  });

  it('reads the text bound from configuration', () => {
    const configured = new KeyDeriver(
      new ConfigService({ LABEL_KEY_MAX_LENGTH: '20' }),
    );
    const { key } = configured.derive(
      'ns',
      'cat',
      'abcdefghij klmnopqrstuvwxyz',
    );
    expect(key).toMatch(/^ns_cat_abcdefghij_[0-9a-f]{8}$/);
  });

  it('derives keys from quoted text', () => {
    expect(deriver.derive('ns', 'cat', "Use '{' to open").key).toBe(
      'ns_cat_use_to_open',
    );
  });

  it('falls back to the default text bound for a malformed setting', () => {
    const configured = new KeyDeriver(
      new ConfigService({ LABEL_KEY_MAX_LENGTH: 'abc' }),
    );
    const textPart = configured
      .derive('ns', 'cat', 'a'.repeat(150))
      .key.slice('ns_cat_'.length);
    expect(textPart).toMatch(/^a{91}_[0-9a-f]{8}$/);
  });

  it('derives from a label reference', () => {
    expect(deriver.deriveRef(labelRef.derived('ns', 'cat', 'Hi'))).toEqual({
      namespace: 'ns',
      key: 'ns_cat_hi',
    });
    expect(
      deriver.deriveRef(labelRef.keyed('ns', 'cat', 'welcome', 'Hi')),
    ).toEqual({ namespace: 'ns', key: 'welcome' });
  });
});

describe('normalizeDefaultText', () => {
  it('removes nested choice placeholders', () => {
    expect(
      normalizeDefaultText('There {0,choice,0#are no files|1#is {0} file} left')
        .replace(/\s+/g, ' ')
        .trim(),
    ).toBe('There left');
  });

  const collapsed = (text: string) =>
    normalizeDefaultText(text).replace(/\s+/g, ' ').trim();

  it('keeps quoted braces as literal text', () => {
    expect(collapsed("Use '{' to open")).toBe('Use { to open');
  });

  it('reads a doubled apostrophe as one apostrophe', () => {
    expect(collapsed("It''s {0}")).toBe("It's");
  });

  it('does not close a placeholder on a quoted brace', () => {
    expect(collapsed("{0,choice,0#a '}' b|1#c} end")).toBe('end');
  });

  it('keeps an apostrophe before ordinary text', () => {
    expect(collapsed("l'heure {0}")).toBe("l'heure");
  });
});

describe('slug', () => {
  it('collapses separators and trims them', () => {
    expect(slug('  Hello,   World!  ', 50)).toBe('hello_world');
  });

  it('returns an empty slug for punctuation only', () => {
    expect(slug('?!', 50)).toBe('');
  });
});

import { describe, expect, test } from 'vitest';

import {
  isGenericMediaName,
  isHelperEntityId,
  isSubset,
  mediaBaseLabel,
  suffixDuplicateBase,
  tokenize
} from '../../src/housekeeping/text.js';

describe('tokenize', () => {
  test('lowercases and splits on runs of non-alphanumerics', () => {
    expect([...tokenize('Living Room')]).toEqual(['living', 'room']);
    expect([...tokenize('light.living_room__lamp-2')]).toEqual(['light', 'living', 'room', 'lamp', '2']);
  });

  test('returns an empty set for blank input', () => {
    expect(tokenize('   ').size).toBe(0);
    expect(tokenize(null).size).toBe(0);
  });

  test('area tokens match only when every token is present', () => {
    const areaTokens = tokenize('Living Room');
    expect(isSubset(areaTokens, tokenize('light.living_room_lamp'))).toBe(true);
    expect(isSubset(areaTokens, tokenize('light.living_lamp'))).toBe(false);
  });
});

describe('suffixDuplicateBase', () => {
  test('strips suffixes of 2 and above', () => {
    expect(suffixDuplicateBase('sensor.kitchen_temp_2')).toBe('sensor.kitchen_temp');
    expect(suffixDuplicateBase('sensor.kitchen_temp_10')).toBe('sensor.kitchen_temp');
  });

  test('ignores _1, _0 and zero-padded suffixes', () => {
    expect(suffixDuplicateBase('sensor.kitchen_temp_1')).toBeNull();
    expect(suffixDuplicateBase('sensor.kitchen_temp_0')).toBeNull();
    expect(suffixDuplicateBase('sensor.kitchen_temp_02')).toBeNull();
    expect(suffixDuplicateBase('sensor.kitchen_temp')).toBeNull();
  });
});

describe('media names', () => {
  test('recognizes generic names case-insensitively', () => {
    expect(isGenericMediaName('TV')).toBe(true);
    expect(isGenericMediaName(' Google Home ')).toBe(true);
    expect(isGenericMediaName('Media Player 3')).toBe(true);
    expect(isGenericMediaName('')).toBe(true);
    expect(isGenericMediaName('Bedroom Sonos')).toBe(false);
  });

  test('derives the base label in priority order', () => {
    expect(mediaBaseLabel('media_player.tv_speaker', 'Speaker')).toBe('TV');
    expect(mediaBaseLabel('media_player.sonos_1', 'Default')).toBe('Speaker');
    expect(mediaBaseLabel('media_player.nest_mini', 'Nest Mini')).toBe('Speaker');
    expect(mediaBaseLabel('media_player.epson', 'Projector')).toBe('Beamer');
    expect(mediaBaseLabel('media_player.chromecast', 'Chromecast')).toBe('Media');
  });
});

describe('isHelperEntityId', () => {
  test('matches helper-like prefixes', () => {
    expect(isHelperEntityId('input_boolean.guest_mode')).toBe(true);
    expect(isHelperEntityId('sensor.power')).toBe(true);
    expect(isHelperEntityId('light.kitchen')).toBe(false);
  });
});

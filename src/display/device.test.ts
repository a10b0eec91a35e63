import { describe, expect, it } from 'vitest';
import { RecordingDisplay } from '../test-support/recording-display.js';
import { GLYPH_BITMAPS, installGlyphs, isDisplayDevice, TEXT_GLYPHS } from './device.js';

describe('device', () => {
  describe('installGlyphs', () => {
    it('should fall back to text glyphs without custom characters', () => {
      expect(installGlyphs(new RecordingDisplay())).toEqual(TEXT_GLYPHS);
    });

    it('should upload the bitmaps and draw with the slot characters', () => {
      const device = new RecordingDisplay({ customChars: true });

      expect(installGlyphs(device)).toEqual({ up: '\x00', siblings: '\x01', action: '\x02' });
      expect(device.customChars.get(0)).toEqual(GLYPH_BITMAPS.up);
      expect(device.customChars.get(1)).toEqual(GLYPH_BITMAPS.siblings);
      expect(device.customChars.get(2)).toEqual(GLYPH_BITMAPS.action);
    });
  });

  describe('isDisplayDevice', () => {
    it('should accept an object with the device members', () => {
      expect(isDisplayDevice(new RecordingDisplay())).toBe(true);
    });

    it('should reject anything else', () => {
      expect(isDisplayDevice(null)).toBe(false);
      expect(isDisplayDevice('lcd')).toBe(false);
      expect(isDisplayDevice({ rows: 2, cols: 16, backlight: true, write: () => undefined })).toBe(false);
      expect(
        isDisplayDevice({ rows: '2', cols: 16, backlight: true, write: () => undefined, clear: () => undefined }),
      ).toBe(false);
    });
  });
});

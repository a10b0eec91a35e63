import { beforeEach, describe, expect, it } from 'vitest';
import { RecordingDisplay } from '../test-support/recording-display.js';
import { changedSpans, DisplaySurface } from './surface.js';

describe('surface', () => {
  describe('changedSpans', () => {
    it('should cover the whole row when the device content is unknown', () => {
      expect(changedSpans(null, 'abcd', 3)).toEqual([{ col: 0, text: 'abcd' }]);
      expect(changedSpans(null, '', 3)).toEqual([]);
    });

    it('should return nothing for identical rows', () => {
      expect(changedSpans('same', 'same', 3)).toEqual([]);
    });

    it('should keep distant changes apart', () => {
      expect(changedSpans('abcdefghij', 'aXcdefghiY', 3)).toEqual([
        { col: 1, text: 'X' },
        { col: 9, text: 'Y' },
      ]);
    });

    it('should merge changes separated by at most the gap', () => {
      expect(changedSpans('abcdefghij', 'aXcdYfghij', 3)).toEqual([{ col: 1, text: 'XcdY' }]);
    });

    it('should merge only adjacent changes with a gap of 0', () => {
      expect(changedSpans('abcd', 'XYcd', 0)).toEqual([{ col: 0, text: 'XY' }]);
      expect(changedSpans('abcd', 'XbYd', 0)).toEqual([
        { col: 0, text: 'X' },
        { col: 2, text: 'Y' },
      ]);
    });
  });

  describe('DisplaySurface', () => {
    let device: RecordingDisplay;
    let surface: DisplaySurface;

    beforeEach(() => {
      device = new RecordingDisplay({ rows: 2, cols: 16 });
      surface = new DisplaySurface(device);
    });

    it('should write every row on the first flush', () => {
      expect(surface.flush()).toBe(2);
      expect(device.writes).toEqual([
        { row: 0, col: 0, text: ' '.repeat(16) },
        { row: 1, col: 0, text: ' '.repeat(16) },
      ]);
    });

    it('should write nothing after clear when nothing changed', () => {
      surface.clear();
      device.resetLog();

      expect(surface.flush()).toBe(0);
      expect(device.writes).toEqual([]);
    });

    it('should write nothing on a second flush', () => {
      surface.setLine(0, 'Hello');
      surface.flush();
      device.resetLog();

      expect(surface.flush()).toBe(0);
      expect(device.writes).toEqual([]);
    });

    it('should write only the changed span of a row', () => {
      surface.clear();
      surface.setLine(0, 'Hello');
      surface.flush();
      expect(device.writes).toEqual([{ row: 0, col: 0, text: 'Hello' }]);

      device.resetLog();
      surface.setLine(0, 'Help');
      surface.flush();

      expect(device.writes).toEqual([{ row: 0, col: 3, text: 'p ' }]);
      expect(surface.cursorPosition).toEqual({ row: 0, col: 5 });
      expect(device.lines()[0]).toBe(`Help${' '.repeat(12)}`);
    });

    it('should pad and cut lines to the width', () => {
      surface.setLine(0, 'Hi');
      surface.setLine(1, 'x'.repeat(20));

      expect(surface.line(0)).toBe(`Hi${' '.repeat(14)}`);
      expect(surface.line(1)).toBe('x'.repeat(16));
    });

    it('should reject rows outside the display', () => {
      expect(() => surface.setLine(2, 'x')).toThrow(RangeError);
      expect(() => surface.line(-1)).toThrow(RangeError);
    });

    it('should blank the device and reset the cursor on clear', () => {
      surface.setLine(1, 'text');
      surface.flush();

      surface.clear();

      expect(device.clears).toBe(1);
      expect(device.lines()).toEqual([' '.repeat(16), ' '.repeat(16)]);
      expect(surface.line(1)).toBe(' '.repeat(16));
      expect(surface.cursorPosition).toEqual({ row: 0, col: 0 });
    });

    it('should switch the backlight only when the state changes', () => {
      expect(surface.setBacklight(true)).toBe(false);
      expect(surface.setBacklight(false)).toBe(true);
      expect(surface.setBacklight(false)).toBe(false);

      expect(device.backlightChanges).toEqual([false]);
      expect(surface.backlight).toBe(false);
    });
  });
});

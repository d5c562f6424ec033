import {
  ApplicationErrorError,
  ApplicationNotRespondingError,
  WindowNotFoundError,
} from '../../src/types';
import {
  parseActivitiesFromDumpsys,
  parseFocusedWindow,
  parseInstalledPackages,
  parseScreenState,
  stripUiDumpFooter,
} from '../../src/utils/dumpsys';

describe('dumpsys parsers', () => {
  describe('parseInstalledPackages', () => {
    it('should return package names after the apk path', () => {
      const output = [
        'package:/data/app/a.apk=com.example.a',
        'package:/system/app/b.apk=com.example.b',
      ].join('\n');

      expect(parseInstalledPackages(output)).toEqual(['com.example.a', 'com.example.b']);
    });

    it('should skip lines without exactly one separator', () => {
      const output = [
        'package:/data/app/base=1.apk=com.example.odd',
        'WARNING: linker: something',
        'package:/data/app/c.apk=',
        'package:/data/app/d.apk=com.example.d',
      ].join('\n');

      expect(parseInstalledPackages(output)).toEqual(['com.example.d']);
    });
  });

  describe('parseActivitiesFromDumpsys', () => {
    const output = [
      'Activity Resolver Table:',
      '  Non-Data Actions:',
      '      android.intent.action.MAIN:',
      '        4f2b9c1a com.example.app/.MainActivity filter 8d7e6f5a',
      '          Action: "android.intent.action.MAIN"',
      '        4f2b9c1a com.example.app/.MainActivity filter 1a2b3c4d',
      '        0a1b2c3d com.example.app/.SettingsActivity filter 9f8e7d6c',
      '        0a1b2c3e com.example.app/com.example.app.DeepActivity filter 9f8e7d6d',
      '        0a1b2c3f com.other.app/.OtherActivity filter 9f8e7d6e',
    ].join('\n');

    it('should list short activity names once, in order of appearance', () => {
      expect(parseActivitiesFromDumpsys(output, 'com.example.app')).toEqual([
        '.MainActivity',
        '.SettingsActivity',
      ]);
    });

    it('should treat dots in the package name literally', () => {
      expect(parseActivitiesFromDumpsys(output, 'com.example.ap.')).toEqual([]);
    });
  });

  describe('parseFocusedWindow', () => {
    it('should read the component from the focused app line', () => {
      const output = [
        'mCurrentFocus=Window{5e1c2b4 u0 com.example.app/com.example.app.MainActivity}',
        'mFocusedApp=ActivityRecord{9a8b7c6 u0 com.example.app/.MainActivity t42}',
      ].join('\n');

      expect(parseFocusedWindow(output)).toEqual({
        packageName: 'com.example.app',
        activity: '.MainActivity',
      });
    });

    it('should fall back to the focus line', () => {
      const output = 'mCurrentFocus=Window{5e1c2b4 u0 com.example.app/com.example.app.MainActivity}';

      expect(parseFocusedWindow(output)).toEqual({
        packageName: 'com.example.app',
        activity: 'com.example.app.MainActivity',
      });
    });

    it('should report a not-responding app before reading the component', () => {
      const output = [
        'mCurrentFocus=Window{1f2e3d u0 Application Not Responding: com.example.app}',
        'mFocusedApp=ActivityRecord{9a8b7c6 u0 com.example.app/.MainActivity t42}',
      ].join('\n');

      expect(() => parseFocusedWindow(output)).toThrow(ApplicationNotRespondingError);
    });

    it('should report a crashed app', () => {
      const output = [
        'mCurrentFocus=Window{1f2e3d u0 Application Error: com.example.app}',
        'mFocusedApp=ActivityRecord{9a8b7c6 u0 com.example.app/.MainActivity t42}',
      ].join('\n');

      expect(() => parseFocusedWindow(output)).toThrow(ApplicationErrorError);
    });

    it('should throw when no component is present', () => {
      expect(() => parseFocusedWindow('mCurrentFocus=null\nmFocusedApp=null')).toThrow(
        WindowNotFoundError
      );
      expect(() => parseFocusedWindow('')).toThrow(WindowNotFoundError);
    });
  });

  describe('parseScreenState', () => {
    it.each([
      ['mScreenOn=true', 'on'],
      ['mScreenOn=false', 'off'],
      ['  Display Power: state=ON', 'on'],
      ['  Display Power: state=OFF', 'off'],
      ['  Display Power: state=DOZE', 'off'],
      ['mWakefulness=Awake\nDisplay Power: state=ON', 'on'],
      ['mWakefulness=Dozing', 'off'],
      ['', 'unknown'],
    ])('should read %j as %s', (output, expected) => {
      expect(parseScreenState(output)).toBe(expected);
    });
  });

  describe('stripUiDumpFooter', () => {
    it('should drop the confirmation line uiautomator appends', () => {
      expect(
        stripUiDumpFooter('<hierarchy rotation="0"></hierarchy>UI hierchary dumped to: /dev/tty')
      ).toBe('<hierarchy rotation="0"></hierarchy>');
    });

    it('should leave output without a footer unchanged', () => {
      expect(stripUiDumpFooter('<hierarchy />\n')).toBe('<hierarchy />');
    });
  });
});

/**
 * Format Matcher Tests
 *
 * Tests field extraction for each report layout and the registry order.
 */

import {
  checkinMatcher,
  checkinPollingPlaceMatcher,
  mailedBallotMatcher,
  personalAppearanceMatcher,
  defineMatcher,
  getRegisteredLayouts,
  getMatcherOrThrow,
  registerMatcher,
  tryMatch,
  validateRecord,
} from '@checkin/shared';

describe('Format Matchers', () => {
  describe('checkin', () => {
    it('should extract No, Name, State ID and Precinct', () => {
      const record = tryMatch(checkinMatcher, '12   JOHN A SMITH   123456789   S PCT 1');

      expect(record).toEqual({
        layout: 'checkin',
        fields: {
          No: '12',
          Name: 'JOHN A SMITH',
          'State ID': '123456789',
          Precinct: 'S PCT 1',
        },
      });
    });

    it('should keep punctuation inside names', () => {
      const record = tryMatch(checkinMatcher, "3 O'BRIEN-HALE, MARY JO 100200300400 S 12-A");

      expect(record?.fields.Name).toBe("O'BRIEN-HALE, MARY JO");
      expect(record?.fields['State ID']).toBe('100200300400');
      expect(record?.fields.Precinct).toBe('S 12-A');
    });

    it('should not read a short number as the State ID', () => {
      expect(tryMatch(checkinMatcher, '3   JOHN SMITH   12345   S PCT 1')).toBeNull();
    });

    it('should not match an ID longer than 12 digits', () => {
      expect(tryMatch(checkinMatcher, '3   JOHN SMITH   1234567890123   S PCT 1')).toBeNull();
    });

    it('should require the S precinct prefix', () => {
      expect(tryMatch(checkinMatcher, '12   JOHN A SMITH   123456789   PCT 1')).toBeNull();
    });
  });

  describe('checkin_polling_place', () => {
    it('should capture a multi-word polling place', () => {
      const record = tryMatch(
        checkinPollingPlaceMatcher,
        '7   DOE, JANE   1002003004   FIRST BAPTIST CHURCH   S PCT 4'
      );

      expect(record).toEqual({
        layout: 'checkin_polling_place',
        fields: {
          No: '7',
          Name: 'DOE, JANE',
          'State ID': '1002003004',
          'Polling Place': 'FIRST BAPTIST CHURCH',
          Precinct: 'S PCT 4',
        },
      });
    });

    it('should not match a line without a polling place', () => {
      expect(tryMatch(checkinPollingPlaceMatcher, '12   JOHN A SMITH   123456789   S PCT 1')).toBeNull();
    });
  });

  describe('mailed_ballot', () => {
    it('should extract Election, Pct, State ID and Name', () => {
      const record = tryMatch(mailedBallotMatcher, '11/05/2024   101   123456789   SMITH, JOHN A');

      expect(record).toEqual({
        layout: 'mailed_ballot',
        fields: {
          Election: '11/05/2024',
          Pct: '101',
          'State ID': '123456789',
          Name: 'SMITH, JOHN A',
        },
      });
    });

    it('should not match when the precinct column holds a name', () => {
      expect(tryMatch(mailedBallotMatcher, '11/05/2024   SMITH, JOHN A   123456789   101')).toBeNull();
    });
  });

  describe('personal_appearance', () => {
    it('should extract Election, Name, State ID and Precinct', () => {
      const record = tryMatch(personalAppearanceMatcher, '3/5/2024   GARCIA, ANA M   2223334445   204');

      expect(record).toEqual({
        layout: 'personal_appearance',
        fields: {
          Election: '3/5/2024',
          Name: 'GARCIA, ANA M',
          'State ID': '2223334445',
          Precinct: '204',
        },
      });
    });
  });

  describe('records', () => {
    it('should produce frozen records', () => {
      const record = tryMatch(checkinMatcher, '12   JOHN A SMITH   123456789   S PCT 1');

      expect(Object.isFrozen(record)).toBe(true);
      expect(Object.isFrozen(record?.fields)).toBe(true);
    });

    it('should produce records that validate against their layout schema', () => {
      const record = tryMatch(checkinPollingPlaceMatcher, '7 DOE, JANE 1002003004 CITY HALL S PCT 4');

      expect(record).not.toBeNull();
      if (record) {
        expect(validateRecord(record)).toEqual({ valid: true });
      }
    });

    it('should reject a record missing a declared column', () => {
      const result = validateRecord({
        layout: 'checkin',
        fields: { No: '1', Name: 'JOHN SMITH', 'State ID': '123456789' },
      });

      expect(result.valid).toBe(false);
      expect(result.errors).toEqual(["/: must have required property 'Precinct'"]);
    });
  });

  describe('registry', () => {
    it('should register built-in layouts in priority order', () => {
      expect(getRegisteredLayouts()).toEqual([
        'checkin',
        'checkin_polling_place',
        'mailed_ballot',
        'personal_appearance',
      ]);
    });

    it('should refuse a second matcher for the same layout', () => {
      expect(() => registerMatcher(checkinMatcher)).toThrow(
        'Matcher already registered for layout: checkin'
      );
    });

    it('should look up matchers by layout', () => {
      expect(getMatcherOrThrow('mailed_ballot').columns).toEqual(['Election', 'Pct', 'State ID', 'Name']);
    });

    it('should reject a definition without a capture group for every column', () => {
      expect(() =>
        defineMatcher({
          layout: 'checkin',
          description: 'broken',
          columns: ['No', 'Name', 'State ID'],
          rejectionPatterns: [],
          pattern: /^(?<No>\d+)\s+(?<StateID>\d{9})$/,
          naturalKey: 'State ID',
        })
      ).toThrow('Matcher "checkin" has no capture group for column "Name"');
    });

    it('should reject a definition whose natural key is not a column', () => {
      expect(() =>
        defineMatcher({
          layout: 'checkin',
          description: 'broken',
          columns: ['No'],
          rejectionPatterns: [],
          pattern: /^(?<No>\d+)$/,
          naturalKey: 'State ID',
        })
      ).toThrow('Matcher "checkin" does not declare its natural key "State ID"');
    });
  });
});

/**
 * Line Classifier Tests
 *
 * Tests noise rejection, length thresholds and matcher priority.
 */

import {
  classifyLine,
  createLineClassifier,
  mailedBallotMatcher,
  personalAppearanceMatcher,
} from '@checkin/shared';

describe('Line Classifier', () => {
  describe('parsed lines', () => {
    it('should parse a check-in line', () => {
      expect(classifyLine('12   JOHN A SMITH   123456789   S PCT 1')).toEqual({
        kind: 'parsed',
        record: {
          layout: 'checkin',
          fields: {
            No: '12',
            Name: 'JOHN A SMITH',
            'State ID': '123456789',
            Precinct: 'S PCT 1',
          },
        },
      });
    });

    it('should trim surrounding whitespace before matching', () => {
      const result = classifyLine('   12   JOHN A SMITH   123456789   S PCT 1   ');

      expect(result.kind).toBe('parsed');
      if (result.kind === 'parsed') {
        expect(result.record.fields.Precinct).toBe('S PCT 1');
      }
    });

    it('should route a five-column line to the polling place layout', () => {
      const result = classifyLine('7   DOE, JANE   1002003004   FIRST BAPTIST CHURCH   S PCT 4');

      expect(result.kind).toBe('parsed');
      if (result.kind === 'parsed') {
        expect(result.record.layout).toBe('checkin_polling_place');
      }
    });

    it('should route mailed ballot and personal appearance lines', () => {
      const mailed = classifyLine('11/05/2024   101   123456789   SMITH, JOHN A');
      const personal = classifyLine('11/05/2024   SMITH, JOHN A   123456789   101');

      expect(mailed.kind === 'parsed' && mailed.record.layout).toBe('mailed_ballot');
      expect(personal.kind === 'parsed' && personal.record.layout).toBe('personal_appearance');
    });

    it('should classify the same line the same way every time', () => {
      const line = '12   JOHN A SMITH   123456789   S PCT 1';

      expect(classifyLine(line)).toEqual(classifyLine(line));
    });
  });

  describe('noise', () => {
    it('should reject the column header row', () => {
      expect(classifyLine('No.  Name  State ID  Precinct')).toEqual({ kind: 'skip', reason: 'rejected' });
    });

    it('should reject headers case-insensitively', () => {
      expect(classifyLine('name state id precinct polling')).toEqual({ kind: 'skip', reason: 'rejected' });
    });

    it.each([
      'Voter Check-in Report for Medina County',
      'County Name: Medina County, Texas',
      'Election Name: November 2024 General',
      'ePulse Website Post Report Summary',
      'From 10/21/2024 08:00 AM to 11/01/2024',
      'Page 3 of 120 - Medina County Report',
      'Election  Pct  State ID  Name',
      'Personal Appearance Roster - Early Voting',
    ])('should reject banner line "%s"', (line) => {
      expect(classifyLine(line)).toEqual({ kind: 'skip', reason: 'rejected' });
    });

    it('should skip lines shorter than the minimum length', () => {
      expect(classifyLine('12 JOHN 123')).toEqual({ kind: 'skip', reason: 'too_short' });
      expect(classifyLine('                     ')).toEqual({ kind: 'skip', reason: 'too_short' });
    });

    it('should honour a custom minimum length', () => {
      const classify = createLineClassifier({ minLineLength: 50 });

      expect(classify('12   JOHN A SMITH   123456789   S PCT 1')).toEqual({
        kind: 'skip',
        reason: 'too_short',
      });
    });

    it('should treat a partial record as noise', () => {
      expect(classifyLine('12   JOHN A SMITH   123456789   PCT 1')).toEqual({
        kind: 'skip',
        reason: 'unmatched',
      });
    });

    it('should treat wrapped text as noise', () => {
      expect(classifyLine('continued from previous page, see totals')).toEqual({
        kind: 'skip',
        reason: 'unmatched',
      });
    });
  });

  describe('priority order', () => {
    const line = '11/05/2024   101   123456789   SMITH, JOHN A';

    it('should return the first matcher that succeeds', () => {
      const result = classifyLine(line, { matchers: [mailedBallotMatcher, personalAppearanceMatcher] });

      expect(result.kind === 'parsed' && result.record.layout).toBe('mailed_ballot');
    });

    it('should let an earlier matcher claim an ambiguous line', () => {
      const result = classifyLine(line, { matchers: [personalAppearanceMatcher, mailedBallotMatcher] });

      expect(result).toEqual({
        kind: 'parsed',
        record: {
          layout: 'personal_appearance',
          fields: {
            Election: '11/05/2024',
            Name: '101',
            'State ID': '123456789',
            Precinct: 'SMITH, JOHN A',
          },
        },
      });
    });

    it('should only apply rejection patterns of the given matchers', () => {
      const classify = createLineClassifier({ matchers: [personalAppearanceMatcher] });

      // "Election Pct" is a mailed-ballot header; without that matcher it is just unmatched text
      expect(classify('Election  Pct  State ID  Name')).toEqual({ kind: 'skip', reason: 'unmatched' });
    });
  });
});

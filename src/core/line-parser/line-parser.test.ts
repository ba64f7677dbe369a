import { createMockLogger } from '$test-utils/helpers';
import type { MockLogger } from '$test-utils/helpers';
import { parseLine } from './line-parser';
import { parseNumber, describePayload, stripTerminator } from './helpers';

describe('line-parser', () => {
  let logger: MockLogger;

  beforeEach(() => {
    logger = createMockLogger();
  });

  describe('parseLine', () => {
    it('should parse a well-formed line', () => {
      expect(parseLine(Buffer.from('50;300\r\n'), logger)).toEqual([50, 300]);
      expect(logger.warning).not.toHaveBeenCalled();
    });

    it('should parse decimals and signs', () => {
      expect(parseLine(Buffer.from('-1.5;+2;.25;3e2\n'), logger)).toEqual([-1.5, 2, 0.25, 300]);
    });

    it('should accept a line without terminator', () => {
      expect(parseLine(Buffer.from('7'), logger)).toEqual([7]);
    });

    it('should reject a non-numeric part and log the raw payload', () => {
      expect(parseLine(Buffer.from('50;abc\r\n'), logger)).toBeNull();
      expect(logger.warning).toHaveBeenCalledWith('Malformed telemetry line "50;abc\\r\\n": "abc" is not a number');
    });

    it('should reject trailing garbage', () => {
      expect(parseLine(Buffer.from('12abc;4\n'), logger)).toBeNull();
    });

    it('should reject NaN and Infinity words', () => {
      expect(parseLine(Buffer.from('NaN;1\n'), logger)).toBeNull();
      expect(parseLine(Buffer.from('1;Infinity\n'), logger)).toBeNull();
    });

    it('should reject an empty part', () => {
      expect(parseLine(Buffer.from('1;;2\n'), logger)).toBeNull();
    });

    it('should reject an empty line', () => {
      expect(parseLine(Buffer.from('\r\n'), logger)).toBeNull();
      expect(logger.warning).toHaveBeenCalledWith('Empty telemetry line "\\r\\n"');
    });

    it('should reject bytes that are not valid UTF-8', () => {
      expect(parseLine(Buffer.from([0x35, 0x30, 0xff, 0x0a]), logger)).toBeNull();
      expect(logger.warning).toHaveBeenCalledTimes(1);
      expect(logger.warning.mock.calls[0][0]).toMatch(/^Undecodable telemetry line /);
    });

    it('should honour a custom delimiter', () => {
      expect(parseLine(Buffer.from('1,2\n'), logger, ',')).toEqual([1, 2]);
    });
  });

  describe('parseNumber', () => {
    it('should trim whitespace', () => {
      expect(parseNumber(' 42 ')).toBe(42);
    });

    it('should return null for empty text', () => {
      expect(parseNumber('')).toBeNull();
      expect(parseNumber('  ')).toBeNull();
    });
  });

  describe('stripTerminator', () => {
    it('should remove trailing CR and LF only', () => {
      expect(stripTerminator('a;b\r\n')).toBe('a;b');
      expect(stripTerminator('\ra;b')).toBe('\ra;b');
    });
  });

  describe('describePayload', () => {
    it('should quote and escape', () => {
      expect(describePayload(Buffer.from('x\n'))).toBe('"x\\n"');
    });
  });
});

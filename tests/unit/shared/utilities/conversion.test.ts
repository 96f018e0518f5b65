import { coerceId, coerceIsk, parseIdList } from '../../../../src/shared/utilities/conversion';

describe('conversion utilities', () => {
  describe('coerceId', () => {
    it('should return integer numbers unchanged', () => {
      expect(coerceId(99003581)).toBe(99003581);
    });

    it('should parse numeric strings', () => {
      expect(coerceId(' 98000001 ')).toBe(98000001);
    });

    it('should reject fractional numbers', () => {
      expect(coerceId(12.5)).toBeUndefined();
    });

    it('should reject non-numeric strings', () => {
      expect(coerceId('12abc')).toBeUndefined();
      expect(coerceId('')).toBeUndefined();
    });

    it('should reject null, undefined and objects', () => {
      expect(coerceId(null)).toBeUndefined();
      expect(coerceId(undefined)).toBeUndefined();
      expect(coerceId({ id: 1 })).toBeUndefined();
    });
  });

  describe('coerceIsk', () => {
    it('should return finite numbers unchanged', () => {
      expect(coerceIsk(1500000.25)).toBe(1500000.25);
    });

    it('should parse numeric strings', () => {
      expect(coerceIsk('2500000')).toBe(2500000);
    });

    it('should default to 0 for missing or invalid values', () => {
      expect(coerceIsk(undefined)).toBe(0);
      expect(coerceIsk(null)).toBe(0);
      expect(coerceIsk('lots')).toBe(0);
      expect(coerceIsk('   ')).toBe(0);
      expect(coerceIsk(Number.POSITIVE_INFINITY)).toBe(0);
    });
  });

  describe('parseIdList', () => {
    it('should return an empty set for undefined or empty input', () => {
      expect(parseIdList(undefined).size).toBe(0);
      expect(parseIdList('').size).toBe(0);
    });

    it('should split on commas and trim entries', () => {
      expect([...parseIdList(' 1, 2 ,3')]).toEqual([1, 2, 3]);
    });

    it('should skip empty entries', () => {
      expect([...parseIdList('1,,2,')]).toEqual([1, 2]);
    });

    it('should report and skip invalid entries', () => {
      // Arrange
      const onInvalid = jest.fn();

      // Act
      const result = parseIdList('1,abc,3', onInvalid);

      // Assert
      expect([...result]).toEqual([1, 3]);
      expect(onInvalid).toHaveBeenCalledTimes(1);
      expect(onInvalid).toHaveBeenCalledWith('abc');
    });
  });
});

import { ConversionError } from '../../errors';
import { celsiusToFahrenheit, convert, knotsToMetresPerSecond, metresPerSecondToKnots } from '../conversion';

describe('conversion', () => {
  describe('convert', () => {
    it('shifts between SI prefixes of length and pressure', () => {
      expect(convert(1234, 'mm', 'm', 'length')).toBe(1.234);
      expect(convert(3, 'km', 'm', 'length')).toBe(3000);
      expect(convert(1013.2, 'hPa', 'Pa', 'pressure')).toBeCloseTo(101320);
      expect(convert(1000, 'hPa', 'kPa', 'pressure')).toBe(100);
    });

    it('converts time units through seconds', () => {
      expect(convert(2, 'h', 'min', 'time')).toBe(120);
      expect(convert(90, 'min', 'h', 'time')).toBe(1.5);
    });

    it('converts temperatures between Celsius, Kelvin and Fahrenheit', () => {
      expect(convert(0, 'Cel', 'K', 'temperature')).toBe(273.15);
      expect(convert(212, 'degF', 'Cel', 'temperature')).toBe(100);
      expect(convert(-40, 'Cel', 'degF', 'temperature')).toBe(-40);
    });

    it('converts between knots and metres per second', () => {
      expect(convert(10, 'KT', 'm/s', 'speed')).toBeCloseTo(5.144, 3);
      expect(convert(7, 'm/s', 'm/s', 'speed')).toBe(7);
    });

    it('throws ConversionError for units it does not know', () => {
      expect(() => convert(1, 'ft', 'm', 'length')).toThrow(ConversionError);
      expect(() => convert(1, 'm/s', 'km/h', 'speed')).toThrow('Cannot convert 1 from m/s to km/h');
      expect(() => convert(1, 'fortnight', 'h', 'time')).toThrow(ConversionError);
    });
  });

  it('keeps the speed helpers inverse to each other', () => {
    expect(metresPerSecondToKnots(knotsToMetresPerSecond(25))).toBeCloseTo(25);
    expect(celsiusToFahrenheit(100)).toBe(212);
  });
});

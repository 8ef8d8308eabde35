import { describe, it, expect } from '@jest/globals';
import {
  TargetEnvironment,
  TaxSystem,
  parseTargetEnvironment,
  parseTaxSystem,
} from '../../../src/model/TaxSystem.js';

describe('TaxSystem', () => {
  describe('parseTaxSystem', () => {
    it.each([
      ['sii', TaxSystem.SII],
      ['SII', TaxSystem.SII],
      [' VeriFactu ', TaxSystem.VERIFACTU],
    ])('should parse %p', (input, expected) => {
      expect(parseTaxSystem(input)).toBe(expected);
    });

    it('should return null for an unknown system', () => {
      expect(parseTaxSystem('ticketbai')).toBeNull();
    });
  });

  describe('parseTargetEnvironment', () => {
    it.each([
      ['test', TargetEnvironment.TEST],
      ['pruebas', TargetEnvironment.TEST],
      ['PRODUCTION', TargetEnvironment.PRODUCTION],
      ['produccion', TargetEnvironment.PRODUCTION],
    ])('should parse %p', (input, expected) => {
      expect(parseTargetEnvironment(input)).toBe(expected);
    });

    it('should return null for an unknown environment', () => {
      expect(parseTargetEnvironment('staging')).toBeNull();
    });
  });
});

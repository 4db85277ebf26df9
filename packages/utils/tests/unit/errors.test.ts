/**
 * Error class tests
 */

import {
  AppError,
  ValidationError,
  InvalidPhoneNumberError,
  AmbiguousTaggingError,
  UnknownLabelError,
  ConfigurationError,
  isOperationalError,
} from '../../src/index.js';

describe('Error Classes', () => {
  describe('AppError', () => {
    it('should carry code and context', () => {
      const error = new AppError('Something failed', 'TEST_ERROR', { input: 'x' });

      expect(error).toBeInstanceOf(Error);
      expect(error.name).toBe('AppError');
      expect(error.code).toBe('TEST_ERROR');
      expect(error.context).toEqual({ input: 'x' });
      expect(error.isOperational).toBe(true);
    });

    it('should serialize to JSON', () => {
      const json = new AppError('Something failed').toJSON();

      expect(json.name).toBe('AppError');
      expect(json.message).toBe('Something failed');
      expect(json.code).toBe('APP_ERROR');
      expect(json).not.toHaveProperty('statusCode');
    });
  });

  describe('InvalidPhoneNumberError', () => {
    it('should be a validation error carrying the text', () => {
      const error = new InvalidPhoneNumberError('202-900-901');

      expect(error).toBeInstanceOf(ValidationError);
      expect(error.name).toBe('InvalidPhoneNumberError');
      expect(error.message).toBe('Invalid phone number: 202-900-901');
      expect(error.code).toBe('INVALID_PHONE_NUMBER');
      expect(error.phone).toBe('202-900-901');
      expect(error.context).toEqual({ phone: '202-900-901' });
    });
  });

  describe('AmbiguousTaggingError', () => {
    it('should carry the token sequence and the distinct labels', () => {
      const tokens = [
        { text: 'Suite', label: 'OccupancyType' },
        { text: 'A', label: 'OccupancyIdentifier' },
        { text: 'Unit', label: 'OccupancyType' },
      ];
      const error = new AmbiguousTaggingError(tokens, { input: 'Suite A Unit' });

      expect(error.tokens).toBe(tokens);
      expect(error.code).toBe('AMBIGUOUS_TAGGING');
      expect(error.context).toEqual({
        labels: ['OccupancyType', 'OccupancyIdentifier'],
        input: 'Suite A Unit',
      });
    });
  });

  describe('UnknownLabelError', () => {
    it('should be a non-operational error naming the label', () => {
      const error = new UnknownLabelError('StreetNameSuffix');

      expect(error.message).toBe("Unknown tagger label 'StreetNameSuffix'");
      expect(error.code).toBe('UNKNOWN_LABEL');
      expect(error.isOperational).toBe(false);
      expect(isOperationalError(error)).toBe(false);
    });
  });

  describe('ConfigurationError', () => {
    it('should record the config key', () => {
      const error = new ConfigurationError('Bad level', 'LOG_LEVEL');

      expect(error.code).toBe('CONFIGURATION_ERROR');
      expect(error.context).toEqual({ configKey: 'LOG_LEVEL' });
      expect(isOperationalError(error)).toBe(true);
    });
  });

  describe('isOperationalError', () => {
    it('should treat plain errors as non-operational', () => {
      expect(isOperationalError(new Error('plain'))).toBe(false);
    });
  });
});

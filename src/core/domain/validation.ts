import { parsePhoneNumberFromString } from 'libphonenumber-js';
import type { QuestionnaireRules } from '../ports';

export type ValidationError =
  | 'too_long'
  | 'banned'
  | 'not_integer'
  | 'out_of_range'
  | 'invalid_phone'
  | 'bad_length';

export type ValidationResult<T> = { valid: true; value: T } | { valid: false; error: ValidationError };

const ok = <T>(value: T): ValidationResult<T> => ({ valid: true, value });
const fail = <T>(error: ValidationError): ValidationResult<T> => ({ valid: false, error });

// Length in characters rather than UTF-16 code units
const charLength = (value: string): number => [...value].length;

const INTEGER_PATTERN = /^[+-]?\d+$/;

const parseInteger = (raw: string): number | null => {
  const trimmed = raw.trim();
  return INTEGER_PATTERN.test(trimmed) ? parseInt(trimmed, 10) : null;
};

// Name and surname share the same rules
export function validatePersonName(raw: string, rules: QuestionnaireRules): ValidationResult<string> {
  const value = raw.trim();
  if (charLength(value) > rules.nameMaxLength) {
    return fail('too_long');
  }

  const lowered = value.toLowerCase();
  if (rules.bannedWords.some((word) => lowered.includes(word))) {
    return fail('banned');
  }

  return ok(value);
}

// Apartment numbers are validated as integers but stored as text
export function validateApartment(raw: string, rules: QuestionnaireRules): ValidationResult<string> {
  const apartment = parseInteger(raw);
  if (apartment === null) {
    return fail('not_integer');
  }
  if (apartment < rules.apartment.min || apartment > rules.apartment.max) {
    return fail('out_of_range');
  }
  return ok(String(apartment));
}

/**
 * Parses an international number (leading +) and returns it in E.164.
 */
export function validatePhone(raw: string): ValidationResult<string> {
  const phone = parsePhoneNumberFromString(raw.trim());
  if (!phone || !phone.isValid()) {
    return fail('invalid_phone');
  }
  return ok(phone.format('E.164'));
}

export function validateVehicleCount(raw: string, rules: QuestionnaireRules): ValidationResult<number> {
  const count = parseInteger(raw);
  if (count === null) {
    return fail('not_integer');
  }
  if (count < 0 || count > rules.vehicles.max) {
    return fail('out_of_range');
  }
  return ok(count);
}

export function validatePlate(raw: string, rules: QuestionnaireRules): ValidationResult<string> {
  const plate = raw.trim();
  const length = charLength(plate);
  if (length < rules.plate.minLength || length > rules.plate.maxLength) {
    return fail('bad_length');
  }
  return ok(plate);
}

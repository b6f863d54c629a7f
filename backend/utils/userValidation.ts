/**
 * Account field validation shared by registration and profile updates
 */

export const USER_TYPES = ['healthcare', 'researcher', 'student', 'other'] as const;
export type UserType = typeof USER_TYPES[number];

export interface ValidationResult {
  valid: boolean;
  message: string;
}

const EMAIL_PATTERN = /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/;
const NAME_PATTERN = /^[a-zA-Z\s'-]+$/;

export const isUserType = (value: unknown): value is UserType =>
  typeof value === 'string' && USER_TYPES.some(type => type === value);

export const validateEmail = (email: string): boolean => EMAIL_PATTERN.test(email);

export const validatePassword = (password: string): ValidationResult => {
  if (password.length < 8) {
    return { valid: false, message: 'Password must be at least 8 characters long' };
  }
  if (!/[A-Za-z]/.test(password)) {
    return { valid: false, message: 'Password must contain at least one letter' };
  }
  if (!/\d/.test(password)) {
    return { valid: false, message: 'Password must contain at least one number' };
  }
  return { valid: true, message: 'Password is valid' };
};

export const validateName = (name: string): ValidationResult => {
  if (name.trim().length < 2) {
    return { valid: false, message: 'Name must be at least 2 characters long' };
  }
  if (!NAME_PATTERN.test(name)) {
    return { valid: false, message: 'Name can only contain letters, spaces, hyphens, and apostrophes' };
  }
  return { valid: true, message: 'Name is valid' };
};

import type { ZodError } from "zod";

/**
 * Form validation failures travel back to the form as `?error=<code>`.
 * Only codes in this table render; the text is never taken from the URL.
 */
export const FORM_ERRORS = {
  message_empty: "Message cannot be empty",
  message_too_long: "Message must be 140 characters or fewer",
  username_required: "Username is required",
  username_length: "Username must be between 3 and 20 characters",
  username_charset: "Username can only contain lowercase letters, numbers, and underscores",
  username_reserved: "That username is reserved",
  email_required: "Email is required",
  email_invalid: "Invalid email address",
  email_too_long: "Email must be 255 characters or fewer",
  password_required: "Password is required",
  password_too_short: "Password must be at least 6 characters",
  password_too_long: "Password too long",
  image_url_invalid: "Image URL must be a valid URL",
  header_image_url_invalid: "Header image URL must be a valid URL",
  invalid_input: "Please check the form and try again.",
} as const satisfies Record<string, string>;

export type FormErrorCode = keyof typeof FORM_ERRORS;

export function isFormErrorCode(value: string): value is FormErrorCode {
  return Object.prototype.hasOwnProperty.call(FORM_ERRORS, value);
}

const FORM_ERROR_CODES = Object.keys(FORM_ERRORS).filter(isFormErrorCode);

/** Code for the first issue of a failed parse; messages outside the table map to `invalid_input`. */
export function formErrorCode(error: ZodError): FormErrorCode {
  const message = error.issues[0]?.message;
  return FORM_ERROR_CODES.find((code) => FORM_ERRORS[code] === message) ?? "invalid_input";
}

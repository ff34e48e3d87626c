import { z } from "zod";

import { parseUsername } from "@/lib/username";
import { FORM_ERRORS } from "@/lib/validation/errors";

const username = z.string({ required_error: FORM_ERRORS.username_required }).transform((value, ctx) => {
  const parsed = parseUsername(value);
  if (!parsed.ok) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: parsed.message });
    return z.NEVER;
  }
  return parsed.normalized;
});

// Blank optional inputs arrive as "" from the form.
const optionalUrl = (message: string) =>
  z
    .string()
    .trim()
    .url(message)
    .optional()
    .or(z.literal("").transform(() => undefined));

export const SignupSchema = z.object({
  username,
  email: z
    .string({ required_error: FORM_ERRORS.email_required })
    .trim()
    .toLowerCase()
    .email(FORM_ERRORS.email_invalid)
    .max(255, FORM_ERRORS.email_too_long),
  password: z
    .string({ required_error: FORM_ERRORS.password_required })
    .min(6, FORM_ERRORS.password_too_short)
    .max(128, FORM_ERRORS.password_too_long),
  imageUrl: optionalUrl(FORM_ERRORS.image_url_invalid),
  headerImageUrl: optionalUrl(FORM_ERRORS.header_image_url_invalid),
});

export const LoginSchema = z.object({
  username: z.string({ required_error: FORM_ERRORS.username_required }).trim().min(1, FORM_ERRORS.username_required),
  password: z.string({ required_error: FORM_ERRORS.password_required }).min(1, FORM_ERRORS.password_required),
});

export type SignupInput = z.infer<typeof SignupSchema>;
export type LoginInput = z.infer<typeof LoginSchema>;

import { z } from "zod";

import { FORM_ERRORS } from "@/lib/validation/errors";

export const MESSAGE_MAX_LENGTH = 140;

// Counts code points, as the varchar(140) column does, not UTF-16 units.
export function messageLength(text: string): number {
  return [...text].length;
}

export const MessageFormSchema = z.object({
  text: z
    .string({ required_error: FORM_ERRORS.message_empty, invalid_type_error: FORM_ERRORS.message_empty })
    .trim()
    .min(1, FORM_ERRORS.message_empty)
    .refine((text) => messageLength(text) <= MESSAGE_MAX_LENGTH, FORM_ERRORS.message_too_long),
});

// Ids arrive as path segments; anything that is not a positive integer is treated as not found.
export const MessageIdSchema = z
  .string()
  .regex(/^[1-9]\d{0,9}$/, "Invalid message id")
  .transform((value) => Number(value))
  .refine((value) => value <= 2_147_483_647, "Invalid message id");

export const UserIdSchema = MessageIdSchema;

export type MessageFormInput = z.infer<typeof MessageFormSchema>;

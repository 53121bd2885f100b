/**
 * Contacts Schemas
 * ================
 * Request validation for the contacts book.
 */

import { z } from "zod";

import {
  CONTACTS_DEFAULT_LIMIT,
  CONTACTS_MAX_LIMIT,
  UPCOMING_BIRTHDAYS_DEFAULT_DAYS,
  UPCOMING_BIRTHDAYS_MAX_DAYS,
} from "../../shared/constants.js";
import { parseWith } from "../../shared/validation.js";

const PHONE_PATTERN = /^\+?\d{1,4}?[-.\s]?\(?\d{1,3}?\)?[-.\s]?\d{1,4}[-.\s]?\d{1,4}[-.\s]?\d{1,9}$/;
const BIRTHDAY_PATTERN = /^(\d{4})-(\d{2})-(\d{2})(?:[T ].*)?$/;

/**
 * Accepts `YYYY-MM-DD` or an ISO datetime and keeps the calendar date only.
 */
const birthdaySchema = z
  .string()
  .trim()
  .transform((value, ctx) => {
    const match = BIRTHDAY_PATTERN.exec(value);
    if (match) {
      const [, y, m, d] = match;
      const date = new Date(Date.UTC(Number(y), Number(m) - 1, Number(d)));
      if (
        date.getUTCFullYear() === Number(y) &&
        date.getUTCMonth() === Number(m) - 1 &&
        date.getUTCDate() === Number(d)
      ) {
        return `${y}-${m}-${d}`;
      }
    }
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Invalid date, expected YYYY-MM-DD" });
    return z.NEVER;
  });

const nameSchema = z.string().trim().min(1).max(50);

export const contactInputSchema = z.object({
  first_name: nameSchema,
  last_name: nameSchema,
  email: z.string().trim().email().max(150),
  phone: z.string().trim().regex(PHONE_PATTERN, "Invalid phone number").max(30).nullish(),
  birthday: birthdaySchema,
  description: z.string().trim().max(150).nullish(),
  favorites: z.boolean().default(false),
});

export type ContactInput = z.infer<typeof contactInputSchema>;

export function validateContactInput(data: unknown): ContactInput {
  return parseWith(contactInputSchema, data, "contact input");
}

export const contactPatchSchema = contactInputSchema
  .extend({ favorites: z.boolean() })
  .partial()
  .refine((value) => Object.keys(value).length > 0, { message: "At least one field is required" });

export type ContactPatch = z.infer<typeof contactPatchSchema>;

export function validateContactPatch(data: unknown): ContactPatch {
  return parseWith(contactPatchSchema, data, "contact patch");
}

const filterSchema = z.string().trim().min(3).max(50).optional();
const limitSchema = z.coerce.number().int().min(1).max(CONTACTS_MAX_LIMIT).default(CONTACTS_DEFAULT_LIMIT);
const offsetSchema = z.coerce.number().int().min(0).default(0);

export const listContactsQuerySchema = z.object({
  first_name: filterSchema,
  last_name: filterSchema,
  email: filterSchema,
  limit: limitSchema,
  offset: offsetSchema,
});

export type ListContactsQuery = z.infer<typeof listContactsQuerySchema>;

export function validateListContactsQuery(data: unknown): ListContactsQuery {
  return parseWith(listContactsQuerySchema, data, "contacts query");
}

export const upcomingBirthdaysQuerySchema = z.object({
  days: z.coerce
    .number()
    .int()
    .min(1)
    .max(UPCOMING_BIRTHDAYS_MAX_DAYS)
    .default(UPCOMING_BIRTHDAYS_DEFAULT_DAYS),
  limit: limitSchema,
  offset: offsetSchema,
});

export type UpcomingBirthdaysQuery = z.infer<typeof upcomingBirthdaysQuerySchema>;

export function validateUpcomingBirthdaysQuery(data: unknown): UpcomingBirthdaysQuery {
  return parseWith(upcomingBirthdaysQuerySchema, data, "birthdays query");
}

export const contactIdParamSchema = z.object({
  contactId: z.coerce.number().int().min(1),
});

export function validateContactId(data: unknown): number {
  return parseWith(contactIdParamSchema, data, "contact id").contactId;
}

export const contactResponseSchema = z.object({
  id: z.number().int(),
  first_name: z.string(),
  last_name: z.string(),
  email: z.string(),
  phone: z.string().nullable(),
  birthday: z.string(),
  description: z.string().nullable(),
  favorites: z.boolean(),
  created_at: z.string(),
  updated_at: z.string(),
});

export type ContactResponse = z.infer<typeof contactResponseSchema>;

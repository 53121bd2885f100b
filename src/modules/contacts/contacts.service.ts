/**
 * Contacts Service
 * ================
 * Owner-scoped contact book operations.
 */

import { NotFoundError } from "../../shared/errors.js";
import { logger } from "../../shared/logger.js";
import { upcomingMonthDays } from "./contacts.birthdays.js";
import * as contactsRepository from "./contacts.repository.js";
import type { Contact, ContactFields } from "./contacts.repository.js";
import type {
  ContactInput,
  ContactPatch,
  ContactResponse,
  ListContactsQuery,
  UpcomingBirthdaysQuery,
} from "./contacts.schemas.js";

export function toContactResponse(contact: Contact): ContactResponse {
  return {
    id: contact.id,
    first_name: contact.firstName,
    last_name: contact.lastName,
    email: contact.email,
    phone: contact.phone,
    birthday: contact.birthday,
    description: contact.description,
    favorites: contact.favorites,
    created_at: contact.createdAt.toISOString(),
    updated_at: contact.updatedAt.toISOString(),
  };
}

function toFields(input: ContactInput): ContactFields {
  return {
    firstName: input.first_name,
    lastName: input.last_name,
    email: input.email,
    phone: input.phone ?? null,
    birthday: input.birthday,
    description: input.description ?? null,
    favorites: input.favorites,
  };
}

function toPartialFields(patch: ContactPatch): Partial<ContactFields> {
  const fields: Partial<ContactFields> = {};
  if (patch.first_name !== undefined) {fields.firstName = patch.first_name;}
  if (patch.last_name !== undefined) {fields.lastName = patch.last_name;}
  if (patch.email !== undefined) {fields.email = patch.email;}
  if (patch.phone !== undefined) {fields.phone = patch.phone;}
  if (patch.birthday !== undefined) {fields.birthday = patch.birthday;}
  if (patch.description !== undefined) {fields.description = patch.description;}
  if (patch.favorites !== undefined) {fields.favorites = patch.favorites;}
  return fields;
}

function notFound(contactId: number): never {
  throw new NotFoundError("Contact", String(contactId));
}

export async function listContacts(userId: number, query: ListContactsQuery): Promise<ContactResponse[]> {
  const contacts = await contactsRepository.listContacts(
    userId,
    { firstName: query.first_name, lastName: query.last_name, email: query.email },
    { limit: query.limit, offset: query.offset }
  );
  return contacts.map(toContactResponse);
}

export async function upcomingBirthdays(
  userId: number,
  query: UpcomingBirthdaysQuery,
  now: Date = new Date()
): Promise<ContactResponse[]> {
  const monthDays = upcomingMonthDays(now, query.days);
  const contacts = await contactsRepository.listContactsByBirthday(userId, monthDays, {
    limit: query.limit,
    offset: query.offset,
  });
  return contacts.map(toContactResponse);
}

export async function getContact(userId: number, contactId: number): Promise<ContactResponse> {
  const contact = await contactsRepository.getContact(userId, contactId);
  if (!contact) {notFound(contactId);}
  return toContactResponse(contact);
}

export async function createContact(userId: number, input: ContactInput): Promise<ContactResponse> {
  const contact = await contactsRepository.createContact(userId, toFields(input));
  logger.info("Contact created", { user_id: userId, contact_id: contact.id });
  return toContactResponse(contact);
}

export async function replaceContact(userId: number, contactId: number, input: ContactInput): Promise<ContactResponse> {
  const contact = await contactsRepository.updateContact(userId, contactId, toFields(input));
  if (!contact) {notFound(contactId);}
  return toContactResponse(contact);
}

export async function updateContact(userId: number, contactId: number, patch: ContactPatch): Promise<ContactResponse> {
  const contact = await contactsRepository.updateContact(userId, contactId, toPartialFields(patch));
  if (!contact) {notFound(contactId);}
  return toContactResponse(contact);
}

export async function deleteContact(userId: number, contactId: number): Promise<void> {
  const deleted = await contactsRepository.deleteContact(userId, contactId);
  if (!deleted) {notFound(contactId);}
  logger.info("Contact deleted", { user_id: userId, contact_id: contactId });
}

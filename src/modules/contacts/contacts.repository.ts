/**
 * Contacts Repository
 * ===================
 * SQL access for the `contacts` table. Every statement binds the owner id.
 */

import type { QueryResultRow } from "pg";

import { isUniqueViolation, pool, type Queryable } from "../../shared/db.js";
import { ConflictError } from "../../shared/errors.js";

export type Contact = {
  id: number;
  userId: number;
  firstName: string;
  lastName: string;
  email: string;
  phone: string | null;
  birthday: string; // YYYY-MM-DD
  description: string | null;
  favorites: boolean;
  createdAt: Date;
  updatedAt: Date;
};

export type ContactFields = {
  firstName: string;
  lastName: string;
  email: string;
  phone: string | null;
  birthday: string;
  description: string | null;
  favorites: boolean;
};

export type ContactFilters = {
  firstName?: string;
  lastName?: string;
  email?: string;
};

export type Page = {
  limit: number;
  offset: number;
};

interface ContactRow extends QueryResultRow {
  id: number;
  user_id: number;
  first_name: string;
  last_name: string;
  email: string;
  phone: string | null;
  birthday: string;
  description: string | null;
  favorites: boolean;
  created_at: Date;
  updated_at: Date;
}

const CONTACT_COLUMNS =
  "id, user_id, first_name, last_name, email, phone, birthday, description, favorites, created_at, updated_at";

const FIELD_COLUMNS: Record<keyof ContactFields, string> = {
  firstName: "first_name",
  lastName: "last_name",
  email: "email",
  phone: "phone",
  birthday: "birthday",
  description: "description",
  favorites: "favorites",
};

const FIELD_KEYS: ReadonlyArray<keyof ContactFields> = [
  "firstName",
  "lastName",
  "email",
  "phone",
  "birthday",
  "description",
  "favorites",
];

function toContact(row: ContactRow): Contact {
  return {
    id: row.id,
    userId: row.user_id,
    firstName: row.first_name,
    lastName: row.last_name,
    email: row.email,
    phone: row.phone,
    birthday: row.birthday,
    description: row.description,
    favorites: row.favorites,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}

function rethrowConflict(err: unknown): never {
  if (isUniqueViolation(err, "contacts_user_email_key")) {
    throw new ConflictError("Contact with this email already exists");
  }
  throw err;
}

export async function listContacts(
  userId: number,
  filters: ContactFilters,
  page: Page,
  db: Queryable = pool
): Promise<Contact[]> {
  const params: unknown[] = [userId];
  const matches: string[] = [];

  for (const key of ["firstName", "lastName", "email"] as const) {
    const value = filters[key];
    if (!value) {continue;}
    params.push(`%${escapeLike(value)}%`);
    matches.push(`${FIELD_COLUMNS[key]} ILIKE $${params.length}`);
  }

  const where = matches.length > 0 ? `user_id = $1 AND (${matches.join(" OR ")})` : "user_id = $1";
  params.push(page.limit, page.offset);

  const result = await db.query<ContactRow>(
    `SELECT ${CONTACT_COLUMNS} FROM contacts
     WHERE ${where}
     ORDER BY id
     LIMIT $${params.length - 1} OFFSET $${params.length}`,
    params
  );
  return result.rows.map(toContact);
}

/**
 * Contacts whose birthday month-day is one of `monthDays`, ordered the same way.
 */
export async function listContactsByBirthday(
  userId: number,
  monthDays: string[],
  page: Page,
  db: Queryable = pool
): Promise<Contact[]> {
  if (monthDays.length === 0) {return [];}

  const result = await db.query<ContactRow>(
    `SELECT ${CONTACT_COLUMNS} FROM contacts
     WHERE user_id = $1 AND to_char(birthday, 'MM-DD') = ANY($2::text[])
     ORDER BY array_position($2::text[], to_char(birthday, 'MM-DD')), id
     LIMIT $3 OFFSET $4`,
    [userId, monthDays, page.limit, page.offset]
  );
  return result.rows.map(toContact);
}

export async function getContact(userId: number, contactId: number, db: Queryable = pool): Promise<Contact | null> {
  const result = await db.query<ContactRow>(
    `SELECT ${CONTACT_COLUMNS} FROM contacts WHERE id = $1 AND user_id = $2`,
    [contactId, userId]
  );
  const row = result.rows[0];
  return row ? toContact(row) : null;
}

export async function createContact(userId: number, fields: ContactFields, db: Queryable = pool): Promise<Contact> {
  try {
    const result = await db.query<ContactRow>(
      `INSERT INTO contacts (user_id, first_name, last_name, email, phone, birthday, description, favorites)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
       RETURNING ${CONTACT_COLUMNS}`,
      [
        userId,
        fields.firstName,
        fields.lastName,
        fields.email,
        fields.phone,
        fields.birthday,
        fields.description,
        fields.favorites,
      ]
    );
    return toContact(result.rows[0]);
  } catch (err) {
    return rethrowConflict(err);
  }
}

/**
 * Updates the given fields only. Returns null when the contact is absent or foreign.
 */
export async function updateContact(
  userId: number,
  contactId: number,
  fields: Partial<ContactFields>,
  db: Queryable = pool
): Promise<Contact | null> {
  const params: unknown[] = [];
  const sets: string[] = [];

  for (const key of FIELD_KEYS) {
    const value = fields[key];
    if (value === undefined) {continue;}
    params.push(value);
    sets.push(`${FIELD_COLUMNS[key]} = $${params.length}`);
  }

  if (sets.length === 0) {return getContact(userId, contactId, db);}

  params.push(contactId, userId);
  try {
    const result = await db.query<ContactRow>(
      `UPDATE contacts SET ${sets.join(", ")}, updated_at = NOW()
       WHERE id = $${params.length - 1} AND user_id = $${params.length}
       RETURNING ${CONTACT_COLUMNS}`,
      params
    );
    const row = result.rows[0];
    return row ? toContact(row) : null;
  } catch (err) {
    return rethrowConflict(err);
  }
}

export async function deleteContact(userId: number, contactId: number, db: Queryable = pool): Promise<boolean> {
  const result = await db.query(`DELETE FROM contacts WHERE id = $1 AND user_id = $2`, [contactId, userId]);
  return (result.rowCount ?? 0) > 0;
}

/**
 * Contacts Routes
 * ===============
 * CRUD, search and upcoming birthdays for the authenticated user's contacts.
 */

import { type Request, type Response, Router } from "express";

import { asyncHandler } from "../../middleware/async-handler.js";
import { getUserAuth, requireUserAuth } from "../../middleware/authz.js";
import { rateLimit } from "../../middleware/rate-limit.js";
import { ok } from "../../shared/http.js";
import {
  validateContactId,
  validateContactInput,
  validateContactPatch,
  validateListContactsQuery,
  validateUpcomingBirthdaysQuery,
} from "./contacts.schemas.js";
import * as contactsService from "./contacts.service.js";

export const contactsRouter = Router();

contactsRouter.use(requireUserAuth());

const createRateLimit = rateLimit({
  name: "contacts_create",
  limitEnvKey: "CONTACTS_CREATE_RATE_LIMIT",
  defaultLimit: 10,
  windowEnvKey: "CONTACTS_CREATE_RATE_WINDOW_SECONDS",
  defaultWindowSeconds: 60,
});

/**
 * @swagger
 * components:
 *   schemas:
 *     ContactInput:
 *       type: object
 *       required: [first_name, last_name, email, birthday]
 *       properties:
 *         first_name: { type: string, maxLength: 50 }
 *         last_name: { type: string, maxLength: 50 }
 *         email: { type: string, format: email }
 *         phone: { type: string, nullable: true, example: "+380 44 123 4567" }
 *         birthday: { type: string, format: date }
 *         description: { type: string, nullable: true, maxLength: 150 }
 *         favorites: { type: boolean, default: false }
 *     Contact:
 *       allOf:
 *         - $ref: '#/components/schemas/ContactInput'
 *         - type: object
 *           properties:
 *             id: { type: integer }
 *             created_at: { type: string, format: date-time }
 *             updated_at: { type: string, format: date-time }
 */

/**
 * @swagger
 * /api/contacts:
 *   get:
 *     summary: List contacts, optionally filtered
 *     description: >-
 *       Filters match case-insensitive substrings and are OR-combined. When
 *       filters are given and nothing matches, the result is an empty list.
 *     tags: [Contacts]
 *     security:
 *       - bearerAuth: []
 *     parameters:
 *       - { in: query, name: first_name, schema: { type: string, minLength: 3, maxLength: 50 } }
 *       - { in: query, name: last_name, schema: { type: string, minLength: 3, maxLength: 50 } }
 *       - { in: query, name: email, schema: { type: string, minLength: 3, maxLength: 50 } }
 *       - { in: query, name: limit, schema: { type: integer, minimum: 1, maximum: 500, default: 10 } }
 *       - { in: query, name: offset, schema: { type: integer, minimum: 0, default: 0 } }
 *     responses:
 *       200:
 *         description: Matching contacts ordered by id
 *   post:
 *     summary: Create a contact
 *     tags: [Contacts]
 *     security:
 *       - bearerAuth: []
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema: { $ref: '#/components/schemas/ContactInput' }
 *     responses:
 *       201:
 *         description: Created contact
 *       409:
 *         description: A contact with this email already exists
 *       429:
 *         description: Too many contacts created in the current window
 */
contactsRouter.get(
  "/",
  asyncHandler(async (req: Request, res: Response) => {
    const auth = getUserAuth(req);
    const query = validateListContactsQuery(req.query);
    const contacts = await contactsService.listContacts(auth.userId, query);
    return ok(res, contacts);
  })
);

contactsRouter.post(
  "/",
  createRateLimit,
  asyncHandler(async (req: Request, res: Response) => {
    const auth = getUserAuth(req);
    const input = validateContactInput(req.body);
    const contact = await contactsService.createContact(auth.userId, input);
    return ok(res, contact, 201);
  })
);

/**
 * @swagger
 * /api/contacts/upcoming_birthdays:
 *   get:
 *     summary: Contacts with a birthday in the next days
 *     tags: [Contacts]
 *     security:
 *       - bearerAuth: []
 *     parameters:
 *       - { in: query, name: days, schema: { type: integer, minimum: 1, maximum: 366, default: 7 } }
 *       - { in: query, name: limit, schema: { type: integer, minimum: 1, maximum: 500, default: 10 } }
 *       - { in: query, name: offset, schema: { type: integer, minimum: 0, default: 0 } }
 *     responses:
 *       200:
 *         description: Contacts in upcoming birthday order
 */
contactsRouter.get(
  "/upcoming_birthdays",
  asyncHandler(async (req: Request, res: Response) => {
    const auth = getUserAuth(req);
    const query = validateUpcomingBirthdaysQuery(req.query);
    const contacts = await contactsService.upcomingBirthdays(auth.userId, query);
    return ok(res, contacts);
  })
);

/**
 * @swagger
 * /api/contacts/{contactId}:
 *   parameters:
 *     - { in: path, name: contactId, required: true, schema: { type: integer, minimum: 1 } }
 *   get:
 *     summary: Get one contact
 *     tags: [Contacts]
 *     security:
 *       - bearerAuth: []
 *     responses:
 *       200: { description: Contact }
 *       404: { description: Not found }
 *   put:
 *     summary: Replace a contact
 *     tags: [Contacts]
 *     security:
 *       - bearerAuth: []
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema: { $ref: '#/components/schemas/ContactInput' }
 *     responses:
 *       200: { description: Updated contact }
 *       404: { description: Not found }
 *       409: { description: Duplicate email }
 *   patch:
 *     summary: Update some fields of a contact
 *     tags: [Contacts]
 *     security:
 *       - bearerAuth: []
 *     responses:
 *       200: { description: Updated contact }
 *       404: { description: Not found }
 *   delete:
 *     summary: Delete a contact
 *     tags: [Contacts]
 *     security:
 *       - bearerAuth: []
 *     responses:
 *       204: { description: Deleted }
 *       404: { description: Not found }
 */
contactsRouter.get(
  "/:contactId",
  asyncHandler(async (req: Request, res: Response) => {
    const auth = getUserAuth(req);
    const contactId = validateContactId(req.params);
    const contact = await contactsService.getContact(auth.userId, contactId);
    return ok(res, contact);
  })
);

contactsRouter.put(
  "/:contactId",
  asyncHandler(async (req: Request, res: Response) => {
    const auth = getUserAuth(req);
    const contactId = validateContactId(req.params);
    const input = validateContactInput(req.body);
    const contact = await contactsService.replaceContact(auth.userId, contactId, input);
    return ok(res, contact);
  })
);

contactsRouter.patch(
  "/:contactId",
  asyncHandler(async (req: Request, res: Response) => {
    const auth = getUserAuth(req);
    const contactId = validateContactId(req.params);
    const patch = validateContactPatch(req.body);
    const contact = await contactsService.updateContact(auth.userId, contactId, patch);
    return ok(res, contact);
  })
);

contactsRouter.delete(
  "/:contactId",
  asyncHandler(async (req: Request, res: Response) => {
    const auth = getUserAuth(req);
    const contactId = validateContactId(req.params);
    await contactsService.deleteContact(auth.userId, contactId);
    res.status(204).end();
  })
);

/**
 * Users Routes
 * ============
 * Current user profile and avatar upload.
 */

import { type Request, type Response, Router } from "express";

import { asyncHandler } from "../../middleware/async-handler.js";
import { getUserAuth, requireUserAuth } from "../../middleware/authz.js";
import { avatarUpload } from "../../middleware/upload.js";
import { ValidationError } from "../../shared/errors.js";
import { ok } from "../../shared/http.js";
import * as usersService from "./users.service.js";

export const usersRouter = Router();

usersRouter.use(requireUserAuth());

/**
 * @swagger
 * /api/users/me:
 *   get:
 *     summary: Current user profile
 *     tags: [Users]
 *     security:
 *       - bearerAuth: []
 *     responses:
 *       200:
 *         description: Profile of the authenticated user
 *       401:
 *         description: Missing, expired or tampered access token
 */
usersRouter.get(
  "/me",
  asyncHandler(async (req: Request, res: Response) => {
    const auth = getUserAuth(req);
    const profile = await usersService.getProfile(auth.userId);
    return ok(res, profile);
  })
);

/**
 * @swagger
 * /api/users/avatar:
 *   patch:
 *     summary: Upload a new avatar image
 *     tags: [Users]
 *     security:
 *       - bearerAuth: []
 *     requestBody:
 *       required: true
 *       content:
 *         multipart/form-data:
 *           schema:
 *             type: object
 *             properties:
 *               file:
 *                 type: string
 *                 format: binary
 *     responses:
 *       200:
 *         description: Updated profile with the new avatar URL
 *       422:
 *         description: Missing or non-image file
 *       502:
 *         description: Media host rejected the upload
 */
usersRouter.patch(
  "/avatar",
  avatarUpload,
  asyncHandler(async (req: Request, res: Response) => {
    const auth = getUserAuth(req);
    if (!req.file) {throw new ValidationError("Validation error: file: Required");}

    const profile = await usersService.updateAvatar(auth.userId, req.file);
    return ok(res, profile);
  })
);

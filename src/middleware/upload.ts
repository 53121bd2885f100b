/**
 * Avatar Upload Middleware
 * ========================
 * Buffers a single `file` field in memory; only images up to AVATAR_MAX_BYTES.
 */

import multer from "multer";

import { AVATAR_MAX_BYTES } from "../shared/constants.js";
import { ValidationError } from "../shared/errors.js";

export const avatarUpload = multer({
  storage: multer.memoryStorage(),
  limits: { fileSize: AVATAR_MAX_BYTES, files: 1 },
  fileFilter: (_req, file, cb) => {
    if (!file.mimetype.startsWith("image/")) {
      return cb(new ValidationError("Avatar must be an image"));
    }
    cb(null, true);
  },
}).single("file");

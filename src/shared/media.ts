/**
 * Media Host (Cloudinary)
 * =======================
 * - Lazily configures the Cloudinary SDK from env.
 * - Uploads avatar images and returns a square, cropped delivery URL.
 * - Hidden behind `MediaHost` so tests can swap in an in-process fake.
 */

import { v2 as cloudinary, type UploadApiErrorResponse, type UploadApiResponse } from "cloudinary";

import { envString } from "./env.js";
import { ConfigurationError, ExternalApiError } from "./errors.js";
import { logger } from "./logger.js";

export const AVATAR_SIZE_PX = 250;

export type UploadImageParams = {
  buffer: Buffer;
  publicId: string;
};

export interface MediaHost {
  uploadAvatar(params: UploadImageParams): Promise<{ url: string }>;
}

let configured = false;
let override: MediaHost | null = null;

function ensureConfigured(): void {
  if (configured) {return;}

  const cloudName = envString("CLOUDINARY_NAME");
  const apiKey = envString("CLOUDINARY_API_KEY");
  const apiSecret = envString("CLOUDINARY_API_SECRET");
  if (!cloudName || !apiKey || !apiSecret) {
    throw new ConfigurationError("CLOUDINARY_NAME, CLOUDINARY_API_KEY and CLOUDINARY_API_SECRET are required");
  }

  cloudinary.config({
    cloud_name: cloudName,
    api_key: apiKey,
    api_secret: apiSecret,
    secure: true,
  });
  configured = true;
}

function uploadBuffer(buffer: Buffer, publicId: string): Promise<UploadApiResponse> {
  return new Promise((resolve, reject) => {
    const stream = cloudinary.uploader.upload_stream(
      { public_id: publicId, overwrite: true, resource_type: "image" },
      (error: UploadApiErrorResponse | undefined, result: UploadApiResponse | undefined) => {
        if (error) {return reject(new ExternalApiError("Cloudinary", error.message, error));}
        if (!result) {return reject(new ExternalApiError("Cloudinary", "empty upload response"));}
        resolve(result);
      }
    );
    stream.end(buffer);
  });
}

const cloudinaryHost: MediaHost = {
  async uploadAvatar({ buffer, publicId }) {
    ensureConfigured();

    const result = await uploadBuffer(buffer, publicId);
    logger.info("Avatar uploaded", {
      public_id: result.public_id,
      version: result.version,
      bytes: result.bytes,
    });

    const url = cloudinary.url(result.public_id, {
      width: AVATAR_SIZE_PX,
      height: AVATAR_SIZE_PX,
      crop: "fill",
      version: result.version,
    });
    return { url };
  },
};

export function getMediaHost(): MediaHost {
  return override ?? cloudinaryHost;
}

export function __setMediaHostForTests(host: MediaHost | null): void {
  override = host;
}

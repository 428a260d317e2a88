/**
 * File Upload Middleware
 * Handles GPX file uploads using memory storage (no disk persistence)
 *
 * This middleware uses Multer to:
 * - Accept multipart/form-data file uploads
 * - Store files in memory (Buffer) for processing
 * - Validate file extension (.gpx only)
 * - Enforce file size limits (10MB max)
 *
 * Usage in routes:
 *   router.post("/analyze", uploadGpx.single(GPX_UPLOAD.FORM_FIELD), handleMulterError, handler)
 */

import multer from "multer";
import path from "path";
import type { Request, Response, NextFunction } from "express";
import { GPX_UPLOAD, ERROR_CODES } from "../config/constants.js";

// ============================================
// Storage Configuration
// ============================================

/**
 * Memory storage configuration
 * Files are stored in memory as Buffer objects (req.file.buffer)
 * This avoids disk I/O and simplifies cleanup - no temp files to delete
 */
const storage = multer.memoryStorage();

// ============================================
// File Filter
// ============================================

/**
 * Rejection raised by the file filter for non-.gpx uploads
 */
export class UnsupportedFileTypeError extends Error {
  constructor() {
    super("Only .gpx files are allowed");
    this.name = "UnsupportedFileTypeError";
  }
}

/**
 * File filter function
 * Validates that uploaded files have .gpx extension
 *
 * @param req - Express request object
 * @param file - Multer file object with originalname, mimetype, etc.
 * @param cb - Callback: cb(error) to reject, cb(null, true) to accept
 */
const fileFilter: multer.Options["fileFilter"] = (_req, file, cb) => {
  const ext = path.extname(file.originalname).toLowerCase();

  if (ext !== ".gpx") {
    cb(new UnsupportedFileTypeError());
    return;
  }

  cb(null, true);
};

// ============================================
// Multer Instance
// ============================================

/**
 * Configured Multer instance for GPX uploads
 *
 * Configuration:
 * - storage: Memory storage (files in Buffer)
 * - fileFilter: Only .gpx files accepted
 * - limits.fileSize: Max 10MB (from GPX_UPLOAD.MAX_FILE_SIZE_BYTES)
 *
 * Usage:
 *   uploadGpx.single("gpx_file") - Expects single file in "gpx_file" form field
 */
export const uploadGpx = multer({
  storage,
  fileFilter,
  limits: {
    fileSize: GPX_UPLOAD.MAX_FILE_SIZE_BYTES,
  },
});

// ============================================
// Error Handler Middleware
// ============================================

/**
 * Error handler for Multer upload errors
 *
 * Catches and formats errors from Multer into consistent API responses.
 * Must be placed AFTER uploadGpx middleware in the route chain.
 *
 * Handles:
 * - LIMIT_FILE_SIZE: File exceeds 10MB limit (413)
 * - LIMIT_UNEXPECTED_FILE: File sent under another field name (400)
 * - UnsupportedFileTypeError: Non-.gpx file rejected (400)
 * - Other errors: Passed to next error handler
 *
 * @param error - Error thrown by Multer or file filter
 * @param req - Express request object
 * @param res - Express response object
 * @param next - Next middleware function
 *
 * @example
 * router.post(
 *   "/analyze",
 *   uploadGpx.single("gpx_file"),
 *   handleMulterError,  // <-- Catches upload errors
 *   async (req, res) => { ... }
 * );
 */
export function handleMulterError(
  error: Error,
  _req: Request,
  res: Response,
  next: NextFunction
): void {
  // Handle Multer-specific errors
  if (error instanceof multer.MulterError) {
    if (error.code === "LIMIT_FILE_SIZE") {
      res.status(413).json({
        success: false,
        error: `File too large. Maximum size is ${GPX_UPLOAD.MAX_FILE_SIZE_BYTES / (1024 * 1024)}MB.`,
        code: ERROR_CODES.GPX_FILE_TOO_LARGE,
      });
      return;
    }
    if (error.code === "LIMIT_UNEXPECTED_FILE") {
      res.status(400).json({
        success: false,
        error: `Unexpected file field "${error.field ?? ""}". Upload the GPX file as "${GPX_UPLOAD.FORM_FIELD}".`,
        code: ERROR_CODES.GPX_FILE_REQUIRED,
      });
      return;
    }
    // Other Multer errors (LIMIT_FIELD_COUNT, etc.)
    res.status(400).json({
      success: false,
      error: `Upload error: ${error.message}`,
      code: ERROR_CODES.GPX_INVALID_FORMAT,
    });
    return;
  }

  // Handle file filter rejection
  if (error instanceof UnsupportedFileTypeError) {
    res.status(400).json({
      success: false,
      error: error.message,
      code: ERROR_CODES.GPX_INVALID_FORMAT,
    });
    return;
  }

  // Pass other errors to default error handler
  next(error);
}

/**
 * Input Sanitization
 *
 * Validates user-controlled inputs (preview ids, file names) before they are
 * written into the document or used as filesystem paths.
 *
 * Deny-by-default: only explicitly allowed characters pass validation.
 */

import path from 'path';

export interface ValidationResult {
  valid: boolean;
  sanitized: string;
  error?: string;
}

/**
 * Preview ids name the template inside the planning system.
 * Allowed: letters, digits, spaces, hyphens, underscores, dots, pipes.
 */
const SAFE_PREVIEW_ID_RE = /^[\p{L}\p{N}_\-. |]+$/u;
const MAX_PREVIEW_ID_LENGTH = 64;

export function validatePreviewId(id: string): ValidationResult {
  const trimmed = typeof id === 'string' ? id.trim() : '';
  if (!trimmed) {
    return { valid: false, sanitized: '', error: 'Preview ID is required' };
  }
  if (trimmed.length > MAX_PREVIEW_ID_LENGTH) {
    return {
      valid: false,
      sanitized: '',
      error: `Preview ID is longer than ${MAX_PREVIEW_ID_LENGTH} characters`,
    };
  }
  if (!SAFE_PREVIEW_ID_RE.test(trimmed)) {
    return { valid: false, sanitized: '', error: 'Preview ID contains invalid characters' };
  }
  return { valid: true, sanitized: trimmed };
}

/**
 * Validate a filename (no directory components, no traversal).
 * Optionally restrict to specific extensions.
 */
export function validateFilename(
  filename: string,
  opts?: { allowedExtensions?: string[] }
): ValidationResult {
  if (!filename || typeof filename !== 'string') {
    return { valid: false, sanitized: '', error: 'Filename is required' };
  }

  if (filename.includes('..') || filename.includes('/') || filename.includes('\\') || filename.includes('\0')) {
    return { valid: false, sanitized: '', error: 'Filename contains path traversal characters' };
  }

  if (path.basename(filename) !== filename) {
    return { valid: false, sanitized: '', error: 'Filename contains directory components' };
  }

  if (opts?.allowedExtensions) {
    const ext = path.extname(filename).toLowerCase();
    if (!opts.allowedExtensions.includes(ext)) {
      return {
        valid: false,
        sanitized: '',
        error: `File extension ${ext || '(none)'} not allowed. Allowed: ${opts.allowedExtensions.join(', ')}`,
      };
    }
  }

  return { valid: true, sanitized: filename };
}

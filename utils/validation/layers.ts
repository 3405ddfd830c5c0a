const INVALID_NAME_CHARACTERS = ['<', '>', ':', '"', '|', '?', '*', '/', '\\'];

export type ValidationResult = { valid: true } | { valid: false; message: string };

export function validateLayerName(name: string): ValidationResult {
  if (!name || !name.trim()) {
    return { valid: false, message: 'Layer name cannot be empty.' };
  }

  const invalid = INVALID_NAME_CHARACTERS.find(char => name.includes(char));
  if (invalid) {
    return { valid: false, message: `Layer name cannot contain '${invalid}' character.` };
  }

  return { valid: true };
}

export function sanitizeFilename(filename: string): string {
  let sanitized = filename;
  for (const char of INVALID_NAME_CHARACTERS) {
    sanitized = sanitized.split(char).join('_');
  }
  return sanitized.replace(/\s+/g, ' ').trim();
}

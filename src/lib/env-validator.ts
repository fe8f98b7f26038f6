/**
 * Environment variable validation utilities
 */

/**
 * Validate and get environment variable
 * @param name Environment variable name
 * @param validator Optional validation function
 * @returns Environment variable value or undefined
 */
export function getEnvVar(
  name: string,
  validator?: (value: string) => boolean
): string | undefined {
  const value = process.env[name];

  if (!value || typeof value !== 'string') {
    return undefined;
  }

  // Check for empty strings
  if (value.trim().length === 0) {
    return undefined;
  }

  // Apply custom validation if provided
  if (validator && !validator(value)) {
    console.warn(`Invalid value for environment variable ${name}`);
    return undefined;
  }

  return value.trim();
}

/**
 * Get environment variable with allowed values
 * @param name Environment variable name
 * @param allowedValues Array of allowed values
 * @returns Environment variable value if valid, undefined otherwise
 */
export function getEnvVarEnum<T extends string>(
  name: string,
  allowedValues: readonly T[]
): T | undefined {
  const value = getEnvVar(name)?.toLowerCase();

  if (!value) {
    return undefined;
  }

  const match = allowedValues.find((allowed) => allowed === value);
  if (match) {
    return match;
  }

  console.warn(
    `Invalid value '${value}' for environment variable ${name}. Allowed values: ${allowedValues.join(', ')}`
  );
  return undefined;
}

/**
 * Get an integer environment variable, falling back when unset or malformed
 * @param min Smallest accepted value, inclusive
 */
export function getEnvVarInt(name: string, defaultValue: number, min?: number): number {
  const value = getEnvVar(name, (raw) => /^-?\d+$/.test(raw.trim()));

  if (value === undefined) {
    return defaultValue;
  }

  const parsed = Number.parseInt(value, 10);
  if (min !== undefined && parsed < min) {
    console.warn(`Value ${parsed} for environment variable ${name} is below ${min}, using ${defaultValue}`);
    return defaultValue;
  }

  return parsed;
}

/**
 * Boolean flags accept true/1/yes/on, anything else is false
 */
export function getEnvVarBoolean(name: string): boolean {
  const value = getEnvVar(name)?.toLowerCase();
  return value === 'true' || value === '1' || value === 'yes' || value === 'on';
}

/**
 * Comma separated list, entries trimmed and lowercased, empties dropped
 */
export function getEnvVarList(name: string): string[] | undefined {
  const value = getEnvVar(name);

  if (!value) {
    return undefined;
  }

  const items = value
    .split(',')
    .map((item) => item.trim().toLowerCase())
    .filter(Boolean);

  return items.length > 0 ? items : undefined;
}

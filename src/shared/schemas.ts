/**
 * Input validation for signature configuration
 */

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

/**
 * Validate a comma separated list of algorithms
 */
export function validateAlgorithms(value: string | undefined): {
  valid: boolean;
  error?: string;
  data?: string[];
} {
  if (value === undefined || value.trim().length === 0) {
    return { valid: false, error: 'At least one algorithm is required' };
  }

  const algorithms = value.split(',').map((algorithm) => algorithm.trim());

  if (algorithms.some((algorithm) => algorithm.length === 0)) {
    return { valid: false, error: 'Algorithm names cannot be empty' };
  }

  if (!algorithms.every((algorithm) => /^[A-Za-z0-9_-]+$/.test(algorithm))) {
    return {
      valid: false,
      error: 'Algorithm names must contain only letters, numbers, hyphens, and underscores',
    };
  }

  return { valid: true, data: algorithms };
}

/**
 * Validate a non-negative integer, such as the clock skew in seconds
 */
export function validateNonNegativeInteger(name: string, value: string | undefined): {
  valid: boolean;
  error?: string;
  data?: number;
} {
  if (value === undefined || !/^\d+$/.test(value.trim())) {
    return { valid: false, error: `${name} must be a non-negative integer` };
  }

  const number = Number(value.trim());
  if (!Number.isSafeInteger(number)) {
    return { valid: false, error: `${name} is too large` };
  }

  return { valid: true, data: number };
}

/**
 * Validate required headers per method, given as JSON
 *
 * @example
 * validateRequiredHeaders('{"default":["(request-target)","date"],"post":["(request-target)","date","digest"]}');
 */
export function validateRequiredHeaders(value: string | undefined): {
  valid: boolean;
  error?: string;
  data?: Record<string, string[]>;
} {
  if (value === undefined) {
    return { valid: false, error: 'Required headers are not specified' };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(value);
  } catch {
    return { valid: false, error: 'Required headers must be valid JSON' };
  }

  if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) {
    return { valid: false, error: 'Required headers must be an object of method to header list' };
  }

  const data: Record<string, string[]> = {};

  for (const [method, headers] of Object.entries(parsed)) {
    if (!/^[A-Za-z]+$/.test(method)) {
      return { valid: false, error: `Invalid method "${method}"` };
    }

    if (!isStringArray(headers)) {
      return { valid: false, error: `Headers for "${method}" must be an array of strings` };
    }

    if (!headers.every((header) => /^(\(request-target\)|[A-Za-z0-9-]+)$/.test(header))) {
      return { valid: false, error: `Headers for "${method}" contain an invalid header name` };
    }

    data[method.toLowerCase()] = headers.map((header) => header.toLowerCase());
  }

  return { valid: true, data };
}

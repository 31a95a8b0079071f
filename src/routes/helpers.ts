import type { Response } from 'express';
import type { ZodError } from 'zod';
import type { Planet } from '../daisyworld';
import { getPlanet } from '../world';

/**
 * Fetch the planet, or answer 503 and return null when it is not initialized.
 */
export function requirePlanet(res: Response): Planet | null {
  const planet = getPlanet();
  if (!planet) {
    res.status(503).json({ error: 'Planet is not initialized' });
    return null;
  }
  return planet;
}

export function sendValidationError(res: Response, error: ZodError, what: string): void {
  res.status(400).json({
    error: `Invalid ${what}`,
    issues: error.issues.map((issue) => ({
      path: issue.path.join('.') || 'root',
      message: issue.message,
    })),
  });
}

/** JSON has no NaN; latitude means of extinct species go out as null. */
export function finiteOrNull(value: number): number | null {
  return Number.isFinite(value) ? value : null;
}

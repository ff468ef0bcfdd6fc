/**
 * Raised when a regression protocol cannot produce coefficients:
 * too few points, mismatched inputs, a singular system or no convergence.
 */
export class FitError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FitError';
  }
}

/**
 * Non-interactive confirmation providers
 */

import type { ConfirmationProvider, ConfirmationRequest } from './pipeline.types.js';

/**
 * Accepts a request only when the phrase given for this invocation matches exactly
 */
export class PresetConfirmationProvider implements ConfirmationProvider {
  private readonly phrase?: string;

  constructor(phrase?: string) {
    this.phrase = phrase;
  }

  async confirm(request: ConfirmationRequest): Promise<boolean> {
    return this.phrase === request.expectedPhrase;
  }
}

/**
 * Declines everything (no terminal and no phrase given)
 */
export class DecliningConfirmationProvider implements ConfirmationProvider {
  async confirm(): Promise<boolean> {
    return false;
  }
}

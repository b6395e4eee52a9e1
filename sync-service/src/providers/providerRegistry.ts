import type { ProviderType } from '@notesync/shared';

import type { NoteProvider } from './types.js';

export class ProviderRegistry {
  private readonly providers = new Map<ProviderType, NoteProvider>();

  register(type: ProviderType, provider: NoteProvider): this {
    this.providers.set(type, provider);
    return this;
  }

  get(type: ProviderType): NoteProvider | null {
    return this.providers.get(type) ?? null;
  }
}

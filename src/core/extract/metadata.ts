// src/core/extract/metadata.ts
import type { RenderedPageHandle } from '../render/types.js';
import type { PageMetadata } from '../types/index.js';
import { describeError } from '../errors.js';

type OptionalField = Exclude<keyof PageMetadata, 'canonicalUrl'>;

export class MetadataExtractor {
  constructor(private readonly verbose: boolean = false) {}

  /**
   * Reads each descriptive field on its own. A missing tag or attribute only
   * nulls that field; nothing here rejects.
   */
  async extract(handle: RenderedPageHandle): Promise<PageMetadata> {
    const title = await this.lookup('title', async () => {
      const value = await handle.executeScript('document.title');
      return typeof value === 'string' ? value : null;
    });
    const description = await this.lookup('description', () => this.metaContent(handle, 'description'));
    const author = await this.lookup('author', () => this.metaContent(handle, 'author'));
    const keywords = await this.lookup('keywords', () => this.metaContent(handle, 'keywords'));
    const languageCode = await this.lookup('languageCode', async () => {
      const root = await handle.findElement('html');
      return handle.attribute(root, 'lang');
    });

    return {
      title,
      description,
      author,
      keywords,
      languageCode,
      canonicalUrl: handle.currentUrl(),
    };
  }

  private async metaContent(handle: RenderedPageHandle, name: string): Promise<string | null> {
    const meta = await handle.findElement(`meta[name="${name}"]`);
    return handle.attribute(meta, 'content');
  }

  private async lookup(field: OptionalField, read: () => Promise<string | null>): Promise<string | null> {
    try {
      const value = (await read())?.trim();
      return value ? value : null;
    } catch (error) {
      if (this.verbose) {
        console.error(`[DEBUG] metadata.${field} unavailable: ${describeError(error)}`);
      }
      return null;
    }
  }
}

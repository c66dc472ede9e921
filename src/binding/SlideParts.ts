import type { DecodedImage } from '../utils/ImageDecoder.js';

/**
 * Something a slide shape references through a slide relationship.
 */
export type SlideAttachment =
  | { kind: 'image'; relId: string; image: DecodedImage }
  | { kind: 'chart'; relId: string; xml: string }
  | { kind: 'hyperlink'; relId: string; url: string };

/**
 * Relationship id of the slide's layout; binders allocate from rId2.
 */
export const LAYOUT_RELATIONSHIP_ID = 'rId1';

/**
 * Per-slide allocator for shape ids and relationship ids, collecting the
 * attachments the slide's shapes reference. Id 1 is the shape tree itself.
 */
export class SlidePartContext {
  private shapeId = 1;
  private relationshipCount = 1;
  private readonly hyperlinks = new Map<string, string>();
  readonly attachments: SlideAttachment[] = [];

  nextShapeId(): number {
    this.shapeId += 1;
    return this.shapeId;
  }

  private nextRelId(): string {
    this.relationshipCount += 1;
    return `rId${this.relationshipCount}`;
  }

  attachImage(image: DecodedImage): string {
    const relId = this.nextRelId();
    this.attachments.push({ kind: 'image', relId, image });
    return relId;
  }

  attachChart(xml: string): string {
    const relId = this.nextRelId();
    this.attachments.push({ kind: 'chart', relId, xml });
    return relId;
  }

  /**
   * Registers an external hyperlink, reusing the relationship for a repeated URL.
   */
  attachHyperlink(url: string): string {
    const existing = this.hyperlinks.get(url);
    if (existing) return existing;
    const relId = this.nextRelId();
    this.hyperlinks.set(url, relId);
    this.attachments.push({ kind: 'hyperlink', relId, url });
    return relId;
  }
}

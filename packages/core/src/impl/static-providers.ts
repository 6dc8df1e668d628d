import type { SegmentResolver, TimezoneProvider } from '../interfaces/collaborators';

/**
 * Segment resolver backed by a fixed map. For tests and small deployments.
 */
export class StaticSegmentResolver implements SegmentResolver {
  private segments: Map<string, string[]>;

  constructor(segments: Record<string, string[]> = {}) {
    this.segments = new Map(Object.entries(segments));
  }

  async resolve(segmentId: string): Promise<string[]> {
    return [...(this.segments.get(segmentId) ?? [])];
  }

  define(segmentId: string, contactIds: string[]): void {
    this.segments.set(segmentId, [...contactIds]);
  }
}

/**
 * Timezone provider backed by a fixed map.
 */
export class StaticTimezoneProvider implements TimezoneProvider {
  private zones: Map<string, string>;

  constructor(zones: Record<string, string> = {}) {
    this.zones = new Map(Object.entries(zones));
  }

  async timezoneOf(contactId: string): Promise<string | undefined> {
    return this.zones.get(contactId);
  }

  set(contactId: string, timezone: string): void {
    this.zones.set(contactId, timezone);
  }
}

/**
 * Reads the timezone from a contact property, e.g. `timezone`.
 */
export class PropertyTimezoneProvider implements TimezoneProvider {
  constructor(
    private readonly properties: { get(contactId: string, key: string): Promise<unknown> },
    private readonly key = 'timezone'
  ) {}

  async timezoneOf(contactId: string): Promise<string | undefined> {
    const value = await this.properties.get(contactId, this.key);
    return typeof value === 'string' && value !== '' ? value : undefined;
  }
}

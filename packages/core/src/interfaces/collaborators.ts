/**
 * Resolves an audience for `now` and `at` triggers.
 */
export interface SegmentResolver {
  resolve(segmentId: string): Promise<string[]>;
}

/**
 * Supplies each contact's IANA timezone, e.g. "America/Bogota".
 */
export interface TimezoneProvider {
  /** undefined when the contact has no known zone */
  timezoneOf(contactId: string): Promise<string | undefined>;
}

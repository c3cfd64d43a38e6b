/**
 * OBVIOUSLY-FAKE TEST DATA
 *
 * Entity values the bundled lexicon recognises, built from reserved ranges
 * so nothing here identifies a real person or routes anywhere.
 */

export const TEST_ENTITIES = {
    // .invalid TLD (RFC 6761)
    EMAIL: 'test-user@example.invalid',
    // 000 area numbers are never issued
    SSN: '000-12-0001',
    // 555-01XX is reserved for fiction
    PHONE: '555-010-0000',

    DATE_US: '03/15/2020',
    DATE_ISO: '2020-03-15',
    DATE_LONG: 'March 15, 2020',

    FIRST_NAME: 'John',
    LAST_NAME: 'Smith',
    OTHER_FIRST_NAME: 'Mary',
    CITY: 'Paris',
    OTHER_CITY: 'Berlin',
    NATIONALITY: 'French',
    ORGANIZATION: 'Test Widget Corp',
} as const;

export const TEST_TEXTS = {
    REPEATED_PERSON: 'John Smith met John Smith again in Paris.',
    TWO_PEOPLE: 'John Smith called Mary Smith from Berlin.',
    CONTACT: `Reach ${TEST_ENTITIES.EMAIL} or ${TEST_ENTITIES.PHONE} before ${TEST_ENTITIES.DATE_US}.`,
    NO_ENTITIES: 'the quick brown fox jumps over the lazy dog',
    BLANK: '   \n\t  ',
} as const;

/**
 * `count` words of filler, each "wN", separated by single spaces.
 */
export const fillerWords = (count: number): string =>
    Array.from({ length: count }, (_, i) => `w${i}`).join(' ');

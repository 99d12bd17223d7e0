import sanitizeHtml from 'sanitize-html';

/**
 * Strip **all** HTML tags / attributes from user-supplied text, drop
 * control characters and trim.  Used on chat messages and on anything that
 * ends up in a maintenance name or description.
 */
export const sanitizeText = (text: unknown): string =>
  sanitizeHtml(typeof text === 'string' ? text : '', {
    allowedTags: [],
    allowedAttributes: {},
    disallowedTagsMode: 'discard',
  })
    .replace(/[\x00-\x08\x0B\x0C\x0E-\x1F\x7F]/g, '')
    .trim();

/** Plain-text `m.room.message` content. */
export type TextBody = {
  msgtype: 'm.text';
  body: string;
};

/** `m.room.message` content carrying HTML, with a plain-text fallback in `body`. */
export type HtmlBody = {
  msgtype: 'm.text';
  format: 'org.matrix.custom.html';
  formatted_body: string;
  body: string;
};

/** Matches anything shaped like a tag; not an HTML parser. */
const TAG_PATTERN = /<[^<]+?>/g;

/** Builds the content of a plain-text message. */
export function getTextBody(text: string): TextBody {
  return {
    msgtype: 'm.text',
    body: text,
  };
}

/**
 * Builds the content of an HTML message. The `body` fallback is `html` with every
 * `<...>` run removed; entities are left as they are.
 *
 * @example
 * getHtmlBody('<b>hi</b>');
 * // { msgtype: 'm.text', format: 'org.matrix.custom.html', formatted_body: '<b>hi</b>', body: 'hi' }
 */
export function getHtmlBody(html: string): HtmlBody {
  return {
    msgtype: 'm.text',
    format: 'org.matrix.custom.html',
    formatted_body: html,
    body: html.replace(TAG_PATTERN, ''),
  };
}

/** Text clean-up applied before anything is sent to a speech engine. */

// Bare host.tld/path forms count too: people paste links without a scheme
const URL_PATTERN =
  /((https?):\/\/)?[a-zA-Z0-9./?:@\-_=#]+\.[a-zA-Z]{2,6}[a-zA-Z0-9.&/?:@\-_=#]*/g;

// Apostrophes inside words stay; quotes next to whitespace and symbols engines spell out go
const UNSPEAKABLE = /\s['’]|['’]\s|[\^_~@!&;#:\-%—“”‘"*/{}[\]()\\|<>=+]/g;

/**
 * Normalize one text unit (title, story body or comment) for narration.
 * The passes run in a fixed order; later ones rely on the earlier ones.
 */
export function normalizeNarrationText(text: string): string {
  let result = text.replace(URL_PATTERN, ' ');
  result = result.replaceAll('\n', '. ');
  result = result.replace(/\bAI\b/g, 'A.I');
  result = result.replace(/\bAGI\b/g, 'A.G.I');
  if (!result.endsWith('.')) {
    result += '.';
  }
  result = result.replaceAll('. . .', '.');
  result = result.replaceAll('.. . ', '.');
  result = result.replaceAll('. . ', '.');
  result = result.replace(/\."\./g, '".');
  return result;
}

/** Strip links and symbols, collapse whitespace. May return an empty string. */
export function sanitizeSpeechText(text: string): string {
  return text
    .replace(URL_PATTERN, ' ')
    .replace(UNSPEAKABLE, ' ')
    .split(/\s+/)
    .filter(Boolean)
    .join(' ');
}

export type SessionMarker =
  | { kind: 'alias'; value: string; index: number }
  | { kind: 'legacy'; value: string; index: number };

// Optional surrounding underscores are Slack italics. No line anchors: the tag
// may sit mid-message when more text follows it.
const ALIAS_MARKER_RE = /_?\(session:\s*([a-z]+(?:-[a-z]+)+)\)_?/g;
const LEGACY_MARKER_RE = /_?\(session_id:\s*([a-f0-9-]+)\)_?/g;

export const formatSessionMarker = (alias: string) => `_(session: ${alias})_`;

export const formatLegacyMarker = (sessionIdentifier: string) => `_(session_id: ${sessionIdentifier})_`;

/** Every marker in `text`, in reading order. */
export const findSessionMarkers = (text: string): SessionMarker[] => {
  const markers: SessionMarker[] = [];
  for (const match of text.matchAll(ALIAS_MARKER_RE)) {
    markers.push({ kind: 'alias', value: match[1], index: match.index ?? 0 });
  }
  for (const match of text.matchAll(LEGACY_MARKER_RE)) {
    markers.push({ kind: 'legacy', value: match[1], index: match.index ?? 0 });
  }
  return markers.sort((a, b) => a.index - b.index);
};

// A marker goes together with the blanks before it: "see _(session: …)_ now" reads "see now".
const ALIAS_STRIP_RE = new RegExp(`[ \\t]*${ALIAS_MARKER_RE.source}`, 'g');
const LEGACY_STRIP_RE = new RegExp(`[ \\t]*${LEGACY_MARKER_RE.source}`, 'g');

export const stripSessionMarkers = (text: string) =>
  text.replace(ALIAS_STRIP_RE, '').replace(LEGACY_STRIP_RE, '').trim();

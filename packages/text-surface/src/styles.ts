export const CLASS_NAMES = {
  wrapper: 'selectext-wrapper',
  host: 'selectext-host',
  surface: 'selectext-surface',
};

/**
 * Read-only, selectable, non-scrolling, unpadded, word-wrapped.
 */
export const surfaceStyles: Partial<CSSStyleDeclaration> = {
  display: 'block',
  boxSizing: 'border-box',
  padding: '0',
  border: '0',
  background: 'transparent',
  overflow: 'hidden',
  whiteSpace: 'pre-wrap',
  overflowWrap: 'break-word',
  wordBreak: 'normal',
  userSelect: 'text',
  webkitUserSelect: 'text',
  cursor: 'text',
  outline: 'none',
};

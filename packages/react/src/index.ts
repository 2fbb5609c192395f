// Main component
export { SelectableText, default } from './SelectableText';

// Helpers
export { useObservedWidth, withTextStyle } from './utils';

// Types
export type { CallbackProps, SelectableTextProps, SelectableTextRef, TextRange, TextStyle } from './types';

// Presets, so callers need only this package
export { DEFAULT_TEXT_STYLE, TEXT_STYLE_PRESETS, createTextStyle, rgba } from '@selectext/style-engine';

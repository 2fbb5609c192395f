export {
  SelectableTextSurface,
  WIDTH_CONSTRAINT_ID,
  type ClipboardWriter,
  type SelectableTextSurfaceOptions,
  type WidthConstraint,
} from './surface.js';
export { CLASS_NAMES, surfaceStyles } from './styles.js';

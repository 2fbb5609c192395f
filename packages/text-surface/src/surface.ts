import type { TextRange, TextStyle, TextSurface } from '@selectext/contracts';
import { Logger } from '@selectext/common';
import { DEFAULT_TEXT_STYLE, buildStyledRun } from '@selectext/style-engine';
import { getMeasurementConfig, measureTextHeight, sanitizeWidth } from '@selectext/measuring';
import { CLASS_NAMES, surfaceStyles } from './styles.js';

export const WIDTH_CONSTRAINT_ID = 'widthConstraint';

// CSS renders a lone CR as white space; the line model treats it as a hard break.
const LONE_CARRIAGE_RETURN = /\r(?!\n)/g;

export type WidthConstraint = {
  readonly identifier: string;
  constant: number;
};

export type ClipboardWriter = Pick<Clipboard, 'writeText'>;

export type SelectableTextSurfaceOptions = {
  /** Owner document; defaults to the global `document`. */
  document?: Document;
  logger?: Logger;
};

/**
 * Retained DOM text view: read-only, selectable, sized by an explicit width
 * constraint and measured at a given width with unbounded height.
 *
 * The surface keeps a single text node and a single width constraint for its
 * whole life; later `configure()` calls update both in place.
 */
export class SelectableTextSurface implements TextSurface {
  readonly element: HTMLDivElement;

  private readonly doc: Document;
  private readonly textNode: Text;
  private readonly logger: Logger;
  private readonly constraints = new Map<string, WidthConstraint>();
  private text = '';
  private style: TextStyle = DEFAULT_TEXT_STYLE;
  private disposed = false;

  constructor(options: SelectableTextSurfaceOptions = {}) {
    this.doc = options.document ?? document;
    this.logger = options.logger ?? new Logger(false, 'selectext:surface');

    this.element = this.doc.createElement('div');
    this.element.className = CLASS_NAMES.surface;
    this.element.setAttribute('contenteditable', 'false');
    this.element.setAttribute('role', 'textbox');
    this.element.setAttribute('aria-readonly', 'true');
    this.element.setAttribute('aria-multiline', 'true');
    Object.assign(this.element.style, surfaceStyles);

    this.textNode = this.doc.createTextNode('');
    this.element.appendChild(this.textNode);
    this.element.addEventListener('copy', this.handleCopy);
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  get currentText(): string {
    return this.text;
  }

  get currentStyle(): TextStyle {
    return this.style;
  }

  get widthConstraints(): readonly WidthConstraint[] {
    return Array.from(this.constraints.values());
  }

  mount(host: HTMLElement): void {
    if (this.disposed) {
      this.logger.warn('mount() called after dispose(); ignoring');
      return;
    }
    if (this.element.parentNode !== host) {
      host.appendChild(this.element);
    }
  }

  configure(text: string, style: TextStyle, width: number): void {
    if (this.disposed) {
      this.logger.warn('configure() called after dispose(); ignoring');
      return;
    }

    const run = buildStyledRun(text, style, { fontFamily: getMeasurementConfig().fonts.family });
    this.text = text;
    this.style = style;

    const rendered = text.replace(LONE_CARRIAGE_RETURN, '\n');
    if (this.textNode.data !== rendered) {
      this.textNode.data = rendered;
    }
    Object.assign(this.element.style, run.css);
    this.applyWidthConstraint(sanitizeWidth(width));
  }

  /**
   * Natural height at `width`. Reads the laid-out element when the browser has
   * rendered it, and falls back to the line model while the element is detached
   * or has no layout (as under jsdom).
   */
  measure(width: number): number {
    const clamped = sanitizeWidth(width);
    const rendered = this.readRenderedHeight(clamped);
    if (rendered > 0) return rendered;
    return measureTextHeight({ text: this.text, width: clamped, style: this.style });
  }

  private readRenderedHeight(width: number): number {
    // A zero-width box wraps every character; zero width always measures as one line.
    if (this.disposed || width <= 0 || !this.element.isConnected) return 0;

    const constrained = this.element.style.width;
    const measuredWidth = `${width}px`;
    if (constrained !== measuredWidth) this.element.style.width = measuredWidth;
    const { height } = this.element.getBoundingClientRect();
    if (constrained !== measuredWidth) this.element.style.width = constrained;

    if (!(height > 0)) return 0;
    // The box includes half a line gap above and below; the negative margins hide both.
    return Math.max(0, height - this.style.lineSpacing);
  }

  private applyWidthConstraint(width: number): void {
    const existing = this.constraints.get(WIDTH_CONSTRAINT_ID);
    if (existing) {
      existing.constant = width;
    } else {
      this.constraints.set(WIDTH_CONSTRAINT_ID, { identifier: WIDTH_CONSTRAINT_ID, constant: width });
    }
    this.element.style.width = `${width}px`;
  }

  // ---------------------------------------------------------------------------
  // Selection
  // ---------------------------------------------------------------------------

  /** Selects `[start, end)` of the surface text, clamped to its bounds. */
  selectRange(start: number, end: number): void {
    const selection = this.doc.getSelection();
    if (!selection || this.disposed) return;

    const length = this.text.length;
    const clamp = (value: number) => Math.min(Math.max(0, Math.trunc(value) || 0), length);
    const from = clamp(Math.min(start, end));
    const to = clamp(Math.max(start, end));

    const range = this.doc.createRange();
    range.setStart(this.textNode, from);
    range.setEnd(this.textNode, to);
    selection.removeAllRanges();
    selection.addRange(range);
  }

  /**
   * The part of the document selection that falls inside this surface, or null
   * when nothing inside it is selected.
   */
  getSelection(): TextRange | null {
    const selection = this.doc.getSelection();
    if (!selection || selection.rangeCount === 0) return null;

    const range = selection.getRangeAt(0);
    const start = this.offsetOf(range.startContainer, range.startOffset);
    const end = this.offsetOf(range.endContainer, range.endOffset);
    if (end <= start) return null;
    return { start, end };
  }

  getSelectedText(): string {
    const range = this.getSelection();
    return range ? this.text.slice(range.start, range.end) : '';
  }

  clearSelection(): void {
    if (!this.getSelection()) return;
    this.doc.getSelection()?.removeAllRanges();
  }

  /**
   * Writes the selected text to the clipboard.
   *
   * @returns false when nothing is selected or the clipboard rejected the write
   */
  async copySelection(clipboard?: ClipboardWriter): Promise<boolean> {
    const text = this.getSelectedText();
    if (!text) return false;

    const target = clipboard ?? this.doc.defaultView?.navigator.clipboard;
    if (!target) {
      this.logger.warn('Clipboard API unavailable; cannot copy selection');
      return false;
    }

    try {
      await target.writeText(text);
      return true;
    } catch (error) {
      this.logger.error('Failed to copy selection:', error);
      return false;
    }
  }

  /** Maps a DOM boundary point to a text offset, clipping points outside the surface. */
  private offsetOf(node: Node, offset: number): number {
    if (node === this.textNode) return offset;
    if (node === this.element) return offset === 0 ? 0 : this.text.length;
    if (this.element.contains(node)) return 0;
    if (node.contains(this.element)) {
      // Boundary in an ancestor: compare against the child that holds the surface.
      let child: Node = this.element;
      while (child.parentNode && child.parentNode !== node) child = child.parentNode;
      const index = Array.prototype.indexOf.call(node.childNodes, child);
      return offset <= index ? 0 : this.text.length;
    }
    const position = node.compareDocumentPosition(this.element);
    return position & Node.DOCUMENT_POSITION_FOLLOWING ? 0 : this.text.length;
  }

  private handleCopy = (event: ClipboardEvent): void => {
    const text = this.getSelectedText();
    if (!text || !event.clipboardData) return;
    event.clipboardData.setData('text/plain', text);
    event.preventDefault();
  };

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.element.removeEventListener('copy', this.handleCopy);
    this.element.remove();
  }
}

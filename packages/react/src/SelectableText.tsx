import {
  forwardRef,
  useEffect,
  useId,
  useImperativeHandle,
  useLayoutEffect,
  useRef,
  useState,
  type CSSProperties,
  type ForwardedRef,
} from 'react';
import { Logger } from '@selectext/common';
import { MeasuredTextBridge, scheduleNextTick, type MeasurementScheduler } from '@selectext/layout-bridge';
import { DEFAULT_TEXT_STYLE } from '@selectext/style-engine';
import { CLASS_NAMES, SelectableTextSurface } from '@selectext/text-surface';
import { useObservedWidth } from './utils';
import type { CallbackProps, SelectableTextProps, SelectableTextRef } from './types';

type LatestProps = CallbackProps & { schedule: MeasurementScheduler };

/**
 * SelectableText - read-only, selectable text that sizes itself to its content.
 *
 * The text lives in an imperative surface mounted into a host div. Each commit
 * hands `(text, textStyle, width)` to a bridge, which measures one tick later
 * and reports the height back; the wrapper then reserves exactly that height.
 * The surface and bridge are created in a layout effect, so they mount and
 * dispose cleanly under React Strict Mode.
 */
function SelectableTextInner(props: SelectableTextProps, ref: ForwardedRef<SelectableTextRef>) {
  const {
    text,
    textStyle = DEFAULT_TEXT_STYLE,
    availableWidth,
    // Stored in a ref to avoid rebuilding the bridge
    onHeightChange,
    schedule = scheduleNextTick,
    // Rebuild triggers
    heightEpsilon,
    enableLogging = false,
    id,
    className,
    wrapperStyle,
  } = props;

  const generatedId = useId();
  const wrapperId = id ?? `selectext${generatedId}`;

  const wrapperRef = useRef<HTMLDivElement>(null);
  const hostRef = useRef<HTMLDivElement>(null);
  const surfaceRef = useRef<SelectableTextSurface | null>(null);

  const [bridge, setBridge] = useState<MeasuredTextBridge | null>(null);
  const [height, setHeight] = useState(0);

  const observedWidth = useObservedWidth(wrapperRef, availableWidth === undefined);
  const width = availableWidth ?? observedWidth;

  const latestRef = useRef<LatestProps>({ onHeightChange, schedule });
  useEffect(() => {
    latestRef.current = { onHeightChange, schedule };
  }, [onHeightChange, schedule]);

  useImperativeHandle(
    ref,
    () => ({
      getSurface: () => surfaceRef.current,
      getHeight: () => bridge?.height ?? 0,
      selectRange: (start, end) => surfaceRef.current?.selectRange(start, end),
      getSelectedText: () => surfaceRef.current?.getSelectedText() ?? '',
      copySelection: () => surfaceRef.current?.copySelection() ?? Promise.resolve(false),
    }),
    [bridge],
  );

  // Create and dispose the surface and bridge
  useLayoutEffect(() => {
    const host = hostRef.current;
    if (!host) return;

    const logger = new Logger(enableLogging, 'selectext');
    const surface = new SelectableTextSurface({ logger: logger.child('surface') });
    surface.mount(host);

    const instance = new MeasuredTextBridge(surface, {
      schedule: (task) => latestRef.current.schedule(task),
      heightEpsilon,
      logger: logger.child('bridge'),
    });
    const unsubscribe = instance.onHeightChange((next) => {
      setHeight(next);
      latestRef.current.onHeightChange?.(next);
    });

    surfaceRef.current = surface;
    setBridge(instance);

    return () => {
      unsubscribe();
      instance.dispose();
      surface.dispose();
      surfaceRef.current = null;
    };
  }, [enableLogging, heightEpsilon]);

  // Feed every committed request to the bridge
  useLayoutEffect(() => {
    if (!bridge || bridge.phase === 'disposed') return;
    bridge.update({ text, width, style: textStyle });
  }, [bridge, text, width, textStyle]);

  const wrapperClassName = [CLASS_NAMES.wrapper, className].filter(Boolean).join(' ');
  const style: CSSProperties = { ...wrapperStyle, height: `${height}px` };

  return (
    <div ref={wrapperRef} id={wrapperId} className={wrapperClassName} style={style}>
      <div ref={hostRef} className={CLASS_NAMES.host} />
    </div>
  );
}

/**
 * SelectableText component with forwardRef - exposes the surface and selection helpers.
 */
export const SelectableText = forwardRef<SelectableTextRef, SelectableTextProps>(SelectableTextInner);

SelectableText.displayName = 'SelectableText';

export default SelectableText;

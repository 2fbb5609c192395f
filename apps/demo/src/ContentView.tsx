import { useState, type CSSProperties } from 'react';
import { SelectableText, TEXT_STYLE_PRESETS, withTextStyle } from '@selectext/react';
import samples from './samples.json';

type BlockName = keyof typeof samples;

/** Blocks rendered with SelectableText; the others are plain, non-selectable text. */
type MeasuredBlockName = 'body' | 'title';

const MEASURED_BLOCKS: readonly MeasuredBlockName[] = ['body', 'title'];

const BLOCK_BACKGROUNDS: Record<BlockName, string> = {
  greeting: 'rgba(255, 0, 0, 0.1)',
  body: 'rgba(0, 128, 0, 0.1)',
  title: 'rgba(0, 0, 255, 0.1)',
  footer: 'rgba(255, 255, 0, 0.1)',
};

const columnStyle: CSSProperties = {
  boxSizing: 'border-box',
  height: '100%',
  overflowY: 'auto',
  padding: '0 16px',
};

const blockStyle = (name: BlockName): CSSProperties => ({ backgroundColor: BLOCK_BACKGROUNDS[name] });

const plainStyle = (name: BlockName): CSSProperties => ({
  ...blockStyle(name),
  margin: 0,
  userSelect: 'none',
});

export const formatHeights = (heights: Partial<Record<MeasuredBlockName, number>>): string =>
  MEASURED_BLOCKS.map((name) => `${name}: ${heights[name] ?? 0}px`).join(', ');

/**
 * Demo screen: selectable blocks between two plain lines in a scrolling column,
 * plus the heights the selectable blocks reported.
 */
export function ContentView() {
  const [heights, setHeights] = useState<Partial<Record<MeasuredBlockName, number>>>({});

  const reportHeight = (name: MeasuredBlockName) => (height: number) =>
    setHeights((current) => ({ ...current, [name]: height }));

  return (
    <div className='demo-column' style={columnStyle}>
      <p className='demo-plain' style={plainStyle('greeting')}>
        {samples.greeting}
      </p>
      <SelectableText
        text={samples.body}
        textStyle={TEXT_STYLE_PRESETS.body}
        wrapperStyle={blockStyle('body')}
        onHeightChange={reportHeight('body')}
      />
      {withTextStyle(
        <SelectableText text={samples.title} wrapperStyle={blockStyle('title')} onHeightChange={reportHeight('title')} />,
        TEXT_STYLE_PRESETS.title,
      )}
      <p className='demo-plain' style={plainStyle('footer')}>
        {samples.footer}
      </p>
      <p role='status'>{formatHeights(heights)}</p>
    </div>
  );
}

export default ContentView;

import { StrictMode } from 'react';
import { createRoot } from 'react-dom/client';
import { ContentView } from './ContentView';

const container = document.getElementById('root');
if (!container) {
  throw new Error('[selectext:demo] Missing #root element');
}

createRoot(container).render(
  <StrictMode>
    <ContentView />
  </StrictMode>,
);

import { StrictMode } from 'react';
import { createRoot } from 'react-dom/client';
import { HashRouter } from 'react-router-dom';
import App from './App';
import { crmStore } from './app/store/useCrmStore';
import { seedSampleData } from './services/CustomerSeed';
import { loadCrmConfig } from './services/DataLoader';
import './index.css';

if (loadCrmConfig().sampleData) {
  seedSampleData(crmStore);
}

const container = document.getElementById('root');
if (!container) {
  throw new Error('Root element #root not found.');
}

createRoot(container).render(
  <StrictMode>
    <HashRouter>
      <App />
    </HashRouter>
  </StrictMode>
);

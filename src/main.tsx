import ReactDOM from 'react-dom/client';
import { HashRouter, Routes, Route } from 'react-router-dom';
import { SettingsProvider } from './core/SettingsStore';
import { AppShell } from './app/AppShell';
import { Menu } from './app/routes/Menu';
import { GameRoute } from './app/routes/GameRoute';
import './index.css';

const root = document.getElementById('root');
if (!root) throw new Error('Missing #root element');

ReactDOM.createRoot(root).render(
  <SettingsProvider>
    <HashRouter>
      <AppShell>
        <Routes>
          <Route path="/" element={<Menu />} />
          <Route path="/game/:id" element={<GameRoute />} />
        </Routes>
      </AppShell>
    </HashRouter>
  </SettingsProvider>
);

import React, { createContext, useContext, useState, useCallback, useEffect, type ReactNode } from 'react';
import { setLogLevel } from './logger';
import type { Settings } from './types';

export function getDefaultSettings(): Settings {
  return {
    haptics: true,
    showHitCounts: false,
    logLevel: import.meta.env.DEV ? 'debug' : 'info',
  };
}

interface SettingsContextValue {
  settings: Settings;
  updateSettings: (partial: Partial<Settings>) => void;
  resetSettings: () => void;
}

const SettingsContext = createContext<SettingsContextValue | null>(null);

// Settings live for the session only; nothing is written to storage
export function SettingsProvider({ children }: { children: ReactNode }) {
  const [settings, setSettings] = useState<Settings>(getDefaultSettings);

  useEffect(() => {
    setLogLevel(settings.logLevel);
  }, [settings.logLevel]);

  const updateSettings = useCallback((partial: Partial<Settings>) => {
    setSettings((prev) => ({ ...prev, ...partial }));
  }, []);

  const resetSettings = useCallback(() => {
    setSettings(getDefaultSettings());
  }, []);

  const value: SettingsContextValue = {
    settings,
    updateSettings,
    resetSettings,
  };

  return React.createElement(SettingsContext.Provider, { value }, children);
}

export function useSettings(): SettingsContextValue {
  const ctx = useContext(SettingsContext);
  if (!ctx) {
    throw new Error('useSettings must be used within SettingsProvider');
  }
  return ctx;
}

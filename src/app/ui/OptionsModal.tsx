import type { ChangeEvent } from 'react';
import { useSettings } from '../../core/SettingsStore';
import { LOG_LEVELS, isLogLevel } from '../../core/logger';
import type { Settings } from '../../core/types';

interface OptionsModalProps {
  isOpen: boolean;
  onClose: () => void;
}

type ToggleKey = {
  [K in keyof Settings]: Settings[K] extends boolean ? K : never;
}[keyof Settings];

function Toggle({ label, setting }: { label: string; setting: ToggleKey }) {
  const { settings, updateSettings } = useSettings();
  const enabled = settings[setting];

  const toggle = () => {
    const patch: Partial<Settings> = {};
    patch[setting] = !enabled;
    updateSettings(patch);
  };

  return (
    <label className="flex items-center justify-between cursor-pointer">
      <span className="text-gray-200">{label}</span>
      <button
        role="switch"
        aria-checked={enabled}
        onClick={toggle}
        className={`relative w-12 h-7 rounded-full transition-colors ${
          enabled ? 'bg-primary-500' : 'bg-gray-600'
        }`}
      >
        <span
          className={`absolute top-1 left-1 w-5 h-5 bg-white rounded-full transition-transform ${
            enabled ? 'translate-x-5' : ''
          }`}
        />
      </button>
    </label>
  );
}

export function OptionsModal({ isOpen, onClose }: OptionsModalProps) {
  const { settings, updateSettings, resetSettings } = useSettings();

  if (!isOpen) return null;

  const handleLogLevelChange = (e: ChangeEvent<HTMLSelectElement>) => {
    const { value } = e.target;
    if (isLogLevel(value)) {
      updateSettings({ logLevel: value });
    }
  };

  return (
    <div className="fixed inset-0 z-40 flex items-end justify-center">
      {/* Backdrop */}
      <div
        className="absolute inset-0 bg-black/60 backdrop-blur-sm"
        onClick={onClose}
      />

      {/* Bottom Sheet */}
      <div className="relative w-full max-w-lg bg-gray-800 rounded-t-2xl animate-slide-up max-h-[80vh] overflow-y-auto">
        {/* Handle */}
        <div className="flex justify-center pt-3 pb-2">
          <div className="w-10 h-1 bg-gray-600 rounded-full" />
        </div>

        {/* Header */}
        <div className="flex items-center justify-between px-6 pb-4">
          <h2 className="text-xl font-bold">Options</h2>
          <button
            onClick={onClose}
            className="p-2 -m-2 text-gray-400 hover:text-white"
            aria-label="Close"
          >
            <svg className="w-6 h-6" fill="none" stroke="currentColor" viewBox="0 0 24 24">
              <path strokeLinecap="round" strokeLinejoin="round" strokeWidth={2} d="M6 18L18 6M6 6l12 12" />
            </svg>
          </button>
        </div>

        {/* Sections */}
        <div className="px-6 pb-8 space-y-6">
          <section>
            <h3 className="text-sm font-semibold text-gray-400 uppercase tracking-wide mb-3">
              Gameplay
            </h3>
            <div className="space-y-3">
              <Toggle label="Haptic Feedback" setting="haptics" />
            </div>
          </section>

          <section>
            <h3 className="text-sm font-semibold text-gray-400 uppercase tracking-wide mb-3">
              Display
            </h3>
            <div className="space-y-3">
              <Toggle label="Show Brick Hit Counts" setting="showHitCounts" />
            </div>
          </section>

          <section>
            <h3 className="text-sm font-semibold text-gray-400 uppercase tracking-wide mb-3">
              Diagnostics
            </h3>
            <label className="flex items-center justify-between">
              <span className="text-gray-200">Console Log Level</span>
              <select
                value={settings.logLevel}
                onChange={handleLogLevelChange}
                className="px-3 py-2 bg-gray-700 border border-gray-600 rounded-lg text-white focus:outline-none focus:border-primary-500"
              >
                {LOG_LEVELS.map((level) => (
                  <option key={level} value={level}>
                    {level}
                  </option>
                ))}
              </select>
            </label>
          </section>

          <button
            onClick={resetSettings}
            className="w-full py-3 bg-gray-700 hover:bg-gray-600 text-white font-medium rounded-xl transition-colors"
          >
            Restore Defaults
          </button>
        </div>
      </div>
    </div>
  );
}

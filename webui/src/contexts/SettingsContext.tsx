import React, { createContext, useContext, useState, useCallback, useEffect, ReactNode } from 'react';
import { AppSettings, SettingKey, SettingsStore, getSettingsStore } from '../services/settings';

interface SettingsContextValue {
  settings: AppSettings;
  store: SettingsStore;
  setSetting: <K extends SettingKey>(key: K, value: AppSettings[K]) => void;
  toggleSetting: (key: BooleanSettingKey) => void;
}

type BooleanSettingKey = {
  [K in SettingKey]: AppSettings[K] extends boolean ? K : never;
}[SettingKey];

const SettingsContext = createContext<SettingsContextValue | null>(null);

export const useSettings = () => {
  const context = useContext(SettingsContext);
  if (!context) {
    throw new Error('useSettings must be used within SettingsProvider');
  }
  return context;
};

interface SettingsProviderProps {
  children: ReactNode;
  store?: SettingsStore;
}

export const SettingsProvider: React.FC<SettingsProviderProps> = ({ children, store = getSettingsStore() }) => {
  const [settings, setSettings] = useState<AppSettings>(() => store.getAll());

  // Mirror every write, including ones made straight on the store.
  useEffect(() => {
    setSettings(store.getAll());
    return store.subscribe((key, value) => {
      setSettings(prev => ({ ...prev, [key]: value }));
    });
  }, [store]);

  const setSetting = useCallback(<K extends SettingKey>(key: K, value: AppSettings[K]) => {
    store.set(key, value);
  }, [store]);

  const toggleSetting = useCallback((key: BooleanSettingKey) => {
    store.set(key, !store.get(key));
  }, [store]);

  const value: SettingsContextValue = {
    settings,
    store,
    setSetting,
    toggleSetting
  };

  return (
    <SettingsContext.Provider value={value}>
      {children}
    </SettingsContext.Provider>
  );
};

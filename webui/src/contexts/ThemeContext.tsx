import React, { createContext, useContext, useCallback, useEffect, ReactNode } from 'react';
import { ThemeName, applyTheme } from '../utils/themes';
import { useSettings } from './SettingsContext';

interface ThemeContextValue {
  theme: ThemeName;
  setTheme: (theme: ThemeName) => void;
  toggleTheme: () => void;
}

const ThemeContext = createContext<ThemeContextValue | null>(null);

export const useTheme = () => {
  const context = useContext(ThemeContext);
  if (!context) {
    throw new Error('useTheme must be used within ThemeProvider');
  }
  return context;
};

interface ThemeProviderProps {
  children: ReactNode;
}

export const ThemeProvider: React.FC<ThemeProviderProps> = ({ children }) => {
  const { settings, store } = useSettings();
  const theme = settings.theme;

  const setTheme = useCallback((next: ThemeName) => {
    store.setTheme(next);
  }, [store]);

  const toggleTheme = useCallback(() => {
    store.setTheme(store.get('theme') === 'dark' ? 'light' : 'dark');
  }, [store]);

  // CSS variables and data-theme on <html>
  useEffect(() => {
    applyTheme(theme);
  }, [theme]);

  const value: ThemeContextValue = {
    theme,
    setTheme,
    toggleTheme
  };

  return (
    <ThemeContext.Provider value={value}>
      {children}
    </ThemeContext.Provider>
  );
};

// @datelex/data - Language configuration files and the cached language registry

export {
  LANGUAGES_DIR,
  LanguageNotFoundError,
  availableLanguages,
  loadLanguageInfo
} from './data/load-language.js';

export {
  getLanguage,
  clearLanguageCache,
  setLanguageCacheCapacity,
  setLanguagesDir,
  getLanguagesDir,
  getLanguageCacheStats
} from './data/registry.js';

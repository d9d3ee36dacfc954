export { showThemeTable, showThemeSwatches } from './showThemes.js';

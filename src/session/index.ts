export { BrowseSession } from './browse-session.js';

export { PresenceTracker, PRESENCE_WINDOW_SECONDS } from './presence-tracker.js';

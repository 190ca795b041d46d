export {
  loadSettings,
  getBlockedTermsList,
  settingsSchema,
  type Settings,
} from './settings';

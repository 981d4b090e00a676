export {
  DISABLED_TITLE,
  DISABLED_MESSAGE,
  type DisabledIndicator,
  type StatusIndicator,
  createStatusIndicator,
} from './statusIndicator';

export type {
  PresentationGateway,
  SnoozeHandler,
  OverlayOptions,
  OverlaySurface,
  SoundPlayer,
  FocusStatus,
  LinkOpener,
} from './types.js';

export { OverlayPresenter, type OverlayPresenterDeps } from './overlay-presenter.js';

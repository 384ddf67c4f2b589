export { TrackEditor } from './TrackEditor';
export type { TrackEditorOptions } from './TrackEditor';

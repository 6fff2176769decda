export { assignSamplesToNotes, buildTrashPool } from './note-assigner';
export type { AssignmentOptions, AssignmentResult, CapacityWarning, NoteAssignment } from './types';

export { characterBound, lengthBound, matchingCharacters, similarity } from './similarity';
export {
  buildCandidatePool,
  findBestMatch,
  reconcile,
  type ReconcileOptions,
  type ReconcileResult,
} from './reconciler';

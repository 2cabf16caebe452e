export { DEFAULT_MIRROR_TABLE, adviseMirror, suggestMirror, type MirrorTable } from './mirror';

export { readJsonFile } from './json-file';
export { toSkeletonRecord, loadSkeletonFile, buildSkeletonIndex, loadSkeletonIndex } from './skeleton-index';
export { findScriptFiles, loadScriptFile } from './script-index';
export type { ScriptEntry } from './script-index';
export { indexSampleFiles, loadSampleFile, createFileSampleLoader, createInMemorySampleLoader } from './sample-loader';
export { buildTrackDocument, buildHierarchyDocument, serializeTrackDocument } from './track-document';
export type {
  TrackDocument,
  TrackDocumentInput,
  AnimationDocument,
  HierarchyDocument,
  SourceScriptDocument,
  SourceClipDocument,
  BoneFramesDocument,
  SampleMapDocument
} from './track-document';
export { writeTrackDocument, writeBinaryFile, resetDirectory } from './document-writer';
export { buildTrackGltfDocument, exportTrackToGlb } from './gltf-exporter';

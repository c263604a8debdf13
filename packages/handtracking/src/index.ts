export { mapDetectionsToSnapshot, type VideoSize } from "./mapDetections";
export { HandFeed, type FeedFrame, type SnapshotSource } from "./HandFeed";

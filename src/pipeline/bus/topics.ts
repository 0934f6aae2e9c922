export const DISPATCH_PREFIX = "pipeline.dispatch";
export const RESULT_PREFIX = "pipeline.result";

export const ALL_DISPATCH_TOPICS = `${DISPATCH_PREFIX}.*`;
export const ALL_RESULT_TOPICS = `${RESULT_PREFIX}.*`;

export const ORCHESTRATOR_GROUP = "orchestrator";
export const INVOKER_GROUP = "invokers";

export function dispatchTopic(stage: string): string {
  return `${DISPATCH_PREFIX}.${stage}`;
}

export function resultTopic(stage: string): string {
  return `${RESULT_PREFIX}.${stage}`;
}

/**
 * Match a topic against an exact name or a "prefix.*" pattern. The wildcard
 * covers exactly one trailing segment.
 */
export function topicMatches(pattern: string, topic: string): boolean {
  if (!pattern.endsWith(".*")) return pattern === topic;
  const prefix = pattern.slice(0, -1);
  if (!topic.startsWith(prefix)) return false;
  const rest = topic.slice(prefix.length);
  return rest.length > 0 && !rest.includes(".");
}

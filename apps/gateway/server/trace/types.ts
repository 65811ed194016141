import type { CanonicalMessage } from "../canonical/types.js";

export type PushState = "pending" | "partially_pushed" | "pushed" | "failed";

export type Trace = {
  /** Dataset / project the trace belongs to. */
  projectRef: string;
  entries: CanonicalMessage[];
  pushState: PushState;
};

export type TraceAnnotation = {
  content: string;
  address: string;
  extra_metadata: Record<string, unknown>;
};

export type PushTraceArgs = {
  token: string;
  dataset: string;
  messages: readonly CanonicalMessage[];
  annotations: TraceAnnotation[];
  metadata: Record<string, unknown>;
};

export type AppendMessagesArgs = {
  token: string;
  traceId: string;
  messages: readonly CanonicalMessage[];
  annotations: TraceAnnotation[];
};

export type ProjectPolicy = {
  id: string;
  name: string;
  content: string;
  action: "block" | "log";
};

/** The external trace store. Creates the dataset on first push if absent. */
export interface TraceStore {
  pushTrace(args: PushTraceArgs): Promise<{ traceId: string }>;
  appendMessages(args: AppendMessagesArgs): Promise<void>;
  /** Enabled guardrail policies stored with the project. 404 means none. */
  fetchProjectPolicies(project: string, token: string): Promise<ProjectPolicy[]>;
}

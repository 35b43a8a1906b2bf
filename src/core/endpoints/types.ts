export type OperationResult = unknown;

export interface ReadOperation {
  verb: "read";
  /** Name of the path segment this read selects on, e.g. `part` for `test/{part}`. */
  selector?: string | undefined;
  /** Plain reads only. Results are reused for this long. */
  cacheTimeToLiveMs?: number | undefined;
  invoke: (selection: string | null) => Promise<OperationResult> | OperationResult;
}

export interface WriteOperation {
  verb: "write";
  invoke: (body: Record<string, unknown>) => Promise<OperationResult> | OperationResult;
}

export type EndpointOperation = ReadOperation | WriteOperation;

export interface ManagementEndpoint {
  id: string;
  /** Readable with restricted access, and listed in restricted discovery. */
  restricted?: boolean | undefined;
  operations: EndpointOperation[];
}

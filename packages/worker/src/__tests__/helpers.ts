import type { QueryFn } from "@stakequeue/common";

export interface RecordedQuery {
  text: string;
  params: unknown[];
}

/** In-memory stand-in for the pg pool */
export function fakeQuery(failOnCall?: number) {
  const calls: RecordedQuery[] = [];
  const query: QueryFn = async (text, params = []) => {
    if (failOnCall !== undefined && calls.length + 1 === failOnCall) {
      calls.push({ text, params });
      throw new Error("connection reset");
    }
    calls.push({ text, params });
    return { rowCount: 1 };
  };
  return { query, calls };
}

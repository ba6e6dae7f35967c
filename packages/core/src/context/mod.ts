export {
  createSnapshot,
  currentRequest,
  runWithRequest,
  useRequest,
  withParams,
} from "~/context/request.ts";
export type { RequestSnapshot } from "~/context/request.ts";

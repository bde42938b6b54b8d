export { Blocklist, normalizeBlockedUsers } from "./blocklist.js";
export {
  ContentPolicy,
  hasRequiredTag,
  isMediaOnly,
  type ContentPolicyConfig,
  type FilterInput,
  type PolicyVerdict,
  type RejectReason,
} from "./filter.js";

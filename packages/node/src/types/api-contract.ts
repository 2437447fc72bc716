import type { AuthContext } from "./auth.js";

/** Per-request variables shared by the keeper API's middleware and routes */
export interface AppEnv {
  Variables: {
    requestId: string;
    /** The key's role and actor, or the anonymous viewer when no keys are configured */
    auth: AuthContext;
  };
}

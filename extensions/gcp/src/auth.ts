import { execFile as execFileCb } from "node:child_process";
import { promisify } from "node:util";

const execFileAsync = promisify(execFileCb);

// gcloud tokens live for an hour; refresh well before that.
const CLI_TOKEN_TTL_MS = 50 * 60_000;

export type AccessTokenProvider = () => Promise<string>;

export type TokenProviderOptions = {
  /** Static OAuth2 token from config or GOOGLE_OAUTH_ACCESS_TOKEN. */
  accessToken?: string;
  /** Override for tests; defaults to `gcloud auth print-access-token`. */
  fetchCliToken?: () => Promise<string>;
  now?: () => number;
};

/** Get an access token via `gcloud auth print-access-token`. */
export async function getTokenFromGcloudCli(): Promise<string> {
  const { stdout } = await execFileAsync("gcloud", ["auth", "print-access-token"]);
  const token = stdout.trim();
  if (!token) throw new Error("gcloud CLI returned empty access token");
  return token;
}

export function createAccessTokenProvider(options: TokenProviderOptions = {}): AccessTokenProvider {
  const { accessToken } = options;
  if (accessToken) return async () => accessToken;

  const fetchCliToken = options.fetchCliToken ?? getTokenFromGcloudCli;
  const now = options.now ?? Date.now;
  let cached: { token: string; expiresAt: number } | undefined;

  return async () => {
    if (cached && now() < cached.expiresAt) return cached.token;
    const token = await fetchCliToken();
    cached = { token, expiresAt: now() + CLI_TOKEN_TTL_MS };
    return token;
  };
}

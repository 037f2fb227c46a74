export class TriggerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TriggerError";
  }
}

export type TriggerOptions = {
  token: string;
  repo: string; // owner/name
  eventType: string;
  apiUrl: string;
  reason?: string;
};

const REPO_PATTERN = /^[\w.-]+\/[\w.-]+$/;

/**
 * Sends a repository dispatch event so the hosted build job rebuilds and
 * redeploys the dashboard.
 */
export const triggerRebuild = async (options: TriggerOptions, fetchImpl: typeof fetch = fetch) => {
  if (!options.token) {
    throw new TriggerError("DASHBOARD_TOKEN is required to trigger a rebuild");
  }
  if (!REPO_PATTERN.test(options.repo)) {
    throw new TriggerError(`DASHBOARD_REPO must look like owner/name, got "${options.repo}"`);
  }

  const url = `${options.apiUrl.replace(/\/+$/, "")}/repos/${options.repo}/dispatches`;
  const response = await fetchImpl(url, {
    method: "POST",
    headers: {
      Accept: "application/vnd.github+json",
      Authorization: `Bearer ${options.token}`,
      "Content-Type": "application/json",
      "User-Agent": "smart-facts-dashboard/0.1"
    },
    body: JSON.stringify({
      event_type: options.eventType,
      client_payload: { reason: options.reason ?? "manual" }
    })
  });

  if (!response.ok) {
    throw new TriggerError(`Dispatch failed (${response.status}) for ${options.repo}`);
  }
  return url;
};

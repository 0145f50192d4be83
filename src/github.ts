import { context, getOctokit } from "@actions/github";
import {
  toError,
  type Logger,
  type Owner,
  type Platform,
  type RawArtifact,
} from "./lib.js";

type OctokitInstance = ReturnType<typeof getOctokit>;

type PullRequestRef = { readonly number: number };

export type GitHubPlatformOptions = {
  readonly token: string;
  readonly logger: Logger;
  readonly serverUrl?: string;
};

const PER_PAGE = 100;

export const isNotFound = (error: unknown): boolean =>
  typeof error === "object" &&
  error !== null &&
  "status" in error &&
  error.status === 404;

export const splitRepository = (
  repository: string
): { readonly owner: string; readonly repo: string } => {
  const [owner, repo, ...rest] = repository.split("/");
  if (!owner || !repo || rest.length > 0) {
    throw new Error(`Invalid repository name: ${repository}`);
  }
  return { owner, repo };
};

export const firstPullRequest = (
  pullRequests: readonly PullRequestRef[] | null | undefined
): number | undefined => pullRequests?.[0]?.number;

const listArtifacts = async (
  octokit: OctokitInstance,
  repository: string,
  logger: Logger
): Promise<readonly RawArtifact[]> => {
  const { owner, repo } = splitRepository(repository);

  const artifacts = await octokit.paginate(
    octokit.rest.actions.listArtifactsForRepo,
    { owner, repo, per_page: PER_PAGE }
  );

  // Artifacts only carry the run id; pull requests hang off the run itself.
  const pullRequestByRun = new Map<number, number | undefined>();
  const lookupPullRequest = async (
    runId: number
  ): Promise<number | undefined> => {
    if (pullRequestByRun.has(runId)) {
      return pullRequestByRun.get(runId);
    }
    let number: number | undefined;
    try {
      const { data } = await octokit.rest.actions.getWorkflowRun({
        owner,
        repo,
        run_id: runId,
      });
      number = firstPullRequest(data.pull_requests);
    } catch (error) {
      logger.warning(
        `  ⚠️  Could not look up workflow run ${runId}: ${toError(error).message}`
      );
      number = undefined;
    }
    pullRequestByRun.set(runId, number);
    return number;
  };

  const raw: RawArtifact[] = [];
  for (const artifact of artifacts) {
    const runId = artifact.workflow_run?.id;
    raw.push({
      id: artifact.id,
      name: artifact.name,
      size_in_bytes: artifact.size_in_bytes,
      created_at: artifact.created_at,
      pull_request:
        runId === undefined ? undefined : await lookupPullRequest(runId),
    });
  }
  return raw;
};

/**
 * {@link Platform} backed by the GitHub REST API. The API base URL follows
 * `GITHUB_API_URL` through `getOctokit`.
 */
export const createGitHubPlatform = (
  options: GitHubPlatformOptions
): Platform => {
  const octokit = getOctokit(options.token);
  const serverUrl = options.serverUrl ?? context.serverUrl;

  return {
    currentUser: async () => {
      const { data } = await octokit.rest.users.getAuthenticated();
      return data.login;
    },

    listRepositories: async (owner: Owner) => {
      if (owner.kind === "user") {
        const repos = await octokit.paginate(
          octokit.rest.repos.listForAuthenticatedUser,
          { affiliation: "owner", per_page: PER_PAGE }
        );
        return repos.map((repo) => repo.full_name);
      }
      const repos = await octokit.paginate(octokit.rest.repos.listForOrg, {
        org: owner.login,
        per_page: PER_PAGE,
      });
      return repos.map((repo) => repo.full_name);
    },

    listOrganizations: async () => {
      const orgs = await octokit.paginate(
        octokit.rest.orgs.listForAuthenticatedUser,
        { per_page: PER_PAGE }
      );
      return orgs.map((org) => org.login);
    },

    latestRelease: async (repository) => {
      const { owner, repo } = splitRepository(repository);
      try {
        const { data } = await octokit.rest.repos.getLatestRelease({
          owner,
          repo,
        });
        return data.tag_name || undefined;
      } catch (error) {
        if (isNotFound(error)) {
          return undefined;
        }
        throw error;
      }
    },

    listArtifacts: (repository) =>
      listArtifacts(octokit, repository, options.logger),

    deleteArtifact: async (repository, artifactId) => {
      try {
        const { owner, repo } = splitRepository(repository);
        await octokit.rest.actions.deleteArtifact({
          owner,
          repo,
          artifact_id: artifactId,
        });
        return { ok: true, value: undefined };
      } catch (error) {
        return { ok: false, error: toError(error) };
      }
    },

    artifactsUrl: (repository) => `${serverUrl}/${repository}/actions`,
  };
};

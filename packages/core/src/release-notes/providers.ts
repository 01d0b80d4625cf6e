import { z } from 'zod';

export interface Release {
  tag: string;
  body: string;
}

/**
 * A forge whose releases API can be derived from a download URL.
 */
export interface ReleaseProvider {
  readonly name: string;
  /** Releases endpoint for the project hosting `url`, or undefined if it cannot be derived. */
  apiUrl(url: URL): string | undefined;
  /** Releases in the order the API lists them, or undefined for a body of the wrong shape. */
  parseReleases(body: unknown): Release[] | undefined;
}

function ownerAndRepo(url: URL): [string, string] | undefined {
  const [, owner, repo] = url.pathname.split('/');
  if (!owner || !repo) return undefined;
  return [owner, repo];
}

const GitHubReleasesSchema = z.array(
  z.object({
    tag_name: z.string().nullish(),
    body: z.string().nullish(),
  }),
);

export const github: ReleaseProvider = {
  name: 'github',
  apiUrl(url) {
    const project = ownerAndRepo(url);
    return project && `https://api.github.com/repos/${project[0]}/${project[1]}/releases`;
  },
  parseReleases(body) {
    const parsed = GitHubReleasesSchema.safeParse(body);
    if (!parsed.success) return undefined;
    return parsed.data.map((release) => ({
      tag: release.tag_name ?? '',
      body: release.body ?? '',
    }));
  },
};

const GitLabReleasesSchema = z.array(
  z.object({
    tag_name: z.string().nullish(),
    description: z.string().nullish(),
  }),
);

export const gitlab: ReleaseProvider = {
  name: 'gitlab',
  apiUrl(url) {
    // Package registry links already carry the numeric project id.
    const byId = /^\/api\/v4\/projects\/(\d+)\//.exec(url.pathname);
    if (byId) {
      return `https://${url.host}/api/v4/projects/${byId[1]}/releases`;
    }
    const project = ownerAndRepo(url);
    return project && `https://${url.host}/api/v4/projects/${project[0]}%2F${project[1]}/releases`;
  },
  parseReleases(body) {
    const parsed = GitLabReleasesSchema.safeParse(body);
    if (!parsed.success) return undefined;
    return parsed.data.map((release) => ({
      tag: release.tag_name ?? '',
      body: release.description ?? '',
    }));
  },
};

const BitbucketReleaseSchema = z.object({
  name: z.string().nullish(),
  description: z.string().nullish(),
});

const BitbucketReleasesSchema = z.union([
  z.object({ values: z.array(BitbucketReleaseSchema) }),
  z.array(BitbucketReleaseSchema),
]);

export const bitbucket: ReleaseProvider = {
  name: 'bitbucket',
  apiUrl(url) {
    const project = ownerAndRepo(url);
    return (
      project && `https://api.bitbucket.org/2.0/repositories/${project[0]}/${project[1]}/releases`
    );
  },
  parseReleases(body) {
    const parsed = BitbucketReleasesSchema.safeParse(body);
    if (!parsed.success) return undefined;
    const values = Array.isArray(parsed.data) ? parsed.data : parsed.data.values;
    return values.map((release) => ({
      tag: release.name ?? '',
      body: release.description ?? '',
    }));
  },
};

const PROVIDERS: readonly ReleaseProvider[] = [github, gitlab, bitbucket];

/**
 * Picks the provider named by the first label of the URL's host (`github.com` -> github).
 */
export function providerFor(url: URL): ReleaseProvider | undefined {
  const label = url.hostname.split('.')[0];
  return PROVIDERS.find((provider) => provider.name === label);
}

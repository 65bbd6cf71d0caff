import { DataSourceUnavailable } from '../../src/lib/errors';
import { PlaneClient, stripHtml } from '../../src/lib/plane-client';
import { DEFAULT_RETRY_POLICY } from '../../src/lib/retry-policy';
import { makeProject } from '../helpers/fake-issue-source';

const API = 'https://plane.test/api/v1/workspaces/acme';

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

const RAW_ISSUE = {
  id: 'I1',
  name: 'Fix bug',
  description_stripped: 'Body',
  state: { id: 'S1', name: 'In Progress', group: 'started' },
  target_date: '2025-01-10',
  start_date: null,
  sequence_id: 7,
  priority: 'high',
  assignees: [{ id: 'U1', display_name: 'alice' }],
  labels: [{ id: 'L1', name: 'bug', color: '#ff0000' }],
};

describe('PlaneClient', () => {
  let fetchMock: jest.Mock<Promise<Response>, [string, RequestInit]>;
  let client: PlaneClient;
  const project = makeProject();

  beforeEach(() => {
    fetchMock = jest.fn<Promise<Response>, [string, RequestInit]>();
    client = new PlaneClient({
      baseUrl: 'https://plane.test/',
      apiToken: 'test-token',
      workspaceSlug: 'acme',
      retryPolicy: { ...DEFAULT_RETRY_POLICY, maxAttempts: 3 },
      sleep: async () => undefined,
      fetch: fetchMock,
    });
  });

  describe('listProjects', () => {
    it('should authenticate with the API key and keep only project references', async () => {
      fetchMock.mockResolvedValueOnce(
        json({ results: [{ id: 'P1', name: 'Website', identifier: 'WEB', network: 2 }], next_page_results: false })
      );

      await expect(client.listProjects()).resolves.toEqual([{ id: 'P1', name: 'Website', identifier: 'WEB' }]);
      expect(fetchMock).toHaveBeenCalledWith(
        `${API}/projects/?per_page=100`,
        expect.objectContaining({
          method: 'GET',
          headers: { 'X-API-Key': 'test-token', Accept: 'application/json' },
        })
      );
    });

    it('should not retry an authentication failure', async () => {
      fetchMock.mockResolvedValue(json({ detail: 'Invalid token' }, 401));

      await expect(client.listProjects()).rejects.toThrow(
        new DataSourceUnavailable('Could not list projects: GET projects: HTTP 401')
      );
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });
  });

  describe('listProjectIssues', () => {
    it('should follow the cursor through every page', async () => {
      fetchMock
        .mockResolvedValueOnce(json({ results: [RAW_ISSUE], next_cursor: '100:1:0', next_page_results: true }))
        .mockResolvedValueOnce(
          json({ results: [{ ...RAW_ISSUE, id: 'I2', sequence_id: 8 }], next_cursor: '100:2:0', next_page_results: false })
        );

      const listing = await client.listProjectIssues(project);

      expect(listing.issues.map((issue) => issue.id)).toEqual(['I1', 'I2']);
      expect(listing.rejected).toEqual([]);
      expect(fetchMock.mock.calls[1][0]).toBe(
        `${API}/projects/P1/issues/?expand=assignees%2Clabels%2Cstate&per_page=100&cursor=100%3A1%3A0`
      );
    });

    it('should normalise expanded records', async () => {
      fetchMock.mockResolvedValueOnce(json({ results: [RAW_ISSUE], next_page_results: false }));

      const { issues } = await client.listProjectIssues(project);

      expect(issues).toEqual([
        {
          id: 'I1',
          name: 'Fix bug',
          description: 'Body',
          state: { name: 'In Progress', group: 'started' },
          target_date: '2025-01-10',
          start_date: null,
          sequence_id: 7,
          priority: 'high',
          assignees: [{ id: 'U1', display_name: 'alice' }],
          labels: [{ id: 'L1', name: 'bug' }],
          project,
        },
      ]);
    });

    it('should resolve state ids through the state listing', async () => {
      fetchMock.mockImplementation(async (url: string) =>
        url.includes('/states/')
          ? json([{ id: 'S2', name: 'Done', group: 'completed' }])
          : json([{ ...RAW_ISSUE, state: 'S2', assignees: ['U1'], labels: ['L1'], priority: 'critical' }])
      );

      const [issue] = (await client.listProjectIssues(project)).issues;

      expect(issue.state).toEqual({ name: 'Done', group: 'completed' });
      expect(issue.assignees).toEqual([{ id: 'U1', display_name: 'U1' }]);
      expect(issue.labels).toEqual([{ id: 'L1', name: 'L1' }]);
      expect(issue.priority).toBe('none');
    });

    it('should report invalid records by id instead of failing the listing', async () => {
      fetchMock.mockResolvedValueOnce(json([RAW_ISSUE, { id: 'I3', name: 'No sequence' }]));

      const listing = await client.listProjectIssues(project);

      expect(listing.issues).toHaveLength(1);
      expect(listing.rejected).toEqual([{ id: 'I3', error: 'sequence_id: Required' }]);
    });

    it('should fail the whole listing when a page keeps failing', async () => {
      fetchMock.mockResolvedValue(json({ error: 'oops' }, 500));

      await expect(client.listProjectIssues(project)).rejects.toThrow(
        new DataSourceUnavailable('Could not list issues of WEB: GET issues of WEB: HTTP 500')
      );
      expect(fetchMock).toHaveBeenCalledTimes(3);
    });

    it('should fail on an unexpected response shape', async () => {
      fetchMock.mockResolvedValueOnce(json({ detail: 'nope' }));

      await expect(client.listProjectIssues(project)).rejects.toThrow(
        new DataSourceUnavailable('Could not list issues of WEB: unexpected response shape')
      );
    });

    it('should use the rich-text description when no plain one is present', async () => {
      fetchMock.mockResolvedValueOnce(
        json([{ ...RAW_ISSUE, description_stripped: null, description_html: '<p>Hello &amp; bye</p>' }])
      );

      const [issue] = (await client.listProjectIssues(project)).issues;

      expect(issue.description).toBe('Hello & bye');
    });
  });

  describe('getIssue', () => {
    it('should return null for an issue that no longer exists', async () => {
      fetchMock.mockResolvedValueOnce(json({ detail: 'Not found' }, 404));

      await expect(client.getIssue(project, 'I9')).resolves.toBeNull();
    });

    it('should return the normalised issue', async () => {
      fetchMock.mockResolvedValueOnce(json(RAW_ISSUE));

      await expect(client.getIssue(project, 'I1')).resolves.toMatchObject({ id: 'I1', sequence_id: 7, project });
      expect(fetchMock.mock.calls[0][0]).toBe(`${API}/projects/P1/issues/I1/?expand=assignees%2Clabels%2Cstate`);
    });
  });

  describe('verifyAccess', () => {
    it('should report the failure instead of throwing', async () => {
      fetchMock.mockResolvedValue(json({}, 403));

      await expect(client.verifyAccess()).resolves.toEqual({
        ok: false,
        error: 'Could not list projects: GET projects: HTTP 403',
      });
    });
  });
});

describe('stripHtml', () => {
  it('should turn rich text into plain lines', () => {
    expect(stripHtml('<p>Hello &amp; <b>bye</b></p><p>Line<br/>two</p>')).toBe('Hello & bye\nLine\ntwo');
  });
});

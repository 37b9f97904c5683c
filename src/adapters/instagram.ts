import { ApiPublisher } from '../core/capabilities';
import { OperationOptions, PostRequest, PostResult } from '../core/types';
import { AdapterContext, isPublicUrl, payloadField, publishedResult, runPublishSteps } from './common';
import { createGraphClient, GraphApiClient, readGraphId } from './graphApi';

const resolveBusinessAccount = async (graph: GraphApiClient, configured?: string, signal?: AbortSignal): Promise<string> => {
  if (configured) return configured;
  const pages = await graph.listManagedPages(signal);
  const linked = pages.find((page) => page.instagramAccountId)?.instagramAccountId;
  if (!linked) throw new Error('No Instagram business account linked to any managed page');
  return linked;
};

/**
 * Two-phase Graph API publish: create a media container, then publish it.
 * A container left behind by a failed publish is reported, not deleted.
 */
export class InstagramAdapter implements ApiPublisher {
  readonly platform = 'instagram' as const;
  readonly publishChannel = 'api' as const;

  private readonly graph: GraphApiClient;
  private readonly accountId?: string;

  constructor(context: AdapterContext) {
    this.graph = createGraphClient(context, context.credentials.require('META_ACCESS_TOKEN', 'instagram'));
    this.accountId = context.credentials.get('INSTAGRAM_ACCOUNT_ID');
  }

  async publish(request: PostRequest, { signal }: OperationOptions = {}): Promise<PostResult> {
    const { graph } = this;
    const caption = payloadField(request, 'caption') || payloadField(request, 'message');
    const partialState: Record<string, string> = {};
    let accountId = '';
    let mediaId = '';

    await runPublishSteps(
      this.platform,
      [
        {
          name: 'prepare',
          run: async () => {
            if (!isPublicUrl(request.mediaRef)) throw new Error('Instagram posts need a public image URL');
          },
        },
        {
          name: 'resolve-account',
          run: async () => {
            accountId = await resolveBusinessAccount(graph, this.accountId, signal);
            partialState.accountId = accountId;
          },
        },
        {
          name: 'create-container',
          run: async () => {
            const body = await graph.post(`${accountId}/media`, { image_url: request.mediaRef, caption }, signal);
            partialState.containerId = readGraphId(body, 'media container');
          },
        },
        {
          name: 'publish-container',
          run: async () => {
            const body = await graph.post(`${accountId}/media_publish`, { creation_id: partialState.containerId }, signal);
            mediaId = readGraphId(body, 'media publish');
          },
        },
      ],
      partialState,
    );

    return publishedResult(this.platform, { remoteId: mediaId });
  }
}

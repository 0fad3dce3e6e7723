import type { DeleteResponse, Feed } from '@aio-rest/types'
import type { ApiClient } from '../client'

/**
 * Feeds API service.
 */
export class FeedService {
  constructor(private readonly client: ApiClient) {}

  /**
   * Get a feed by key.
   */
  async getFeed(feedKey: string): Promise<Feed> {
    return this.client.get<Feed>(`feeds/${feedKey}`)
  }

  /**
   * Get all of the user's feeds, including each feed's latest value.
   * Order is whatever the server returns.
   */
  async getAllFeeds(): Promise<Feed[]> {
    return this.client.get<Feed[]>('feeds')
  }

  /**
   * Delete a feed and its data.
   */
  async deleteFeed(feedKey: string): Promise<DeleteResponse> {
    return this.client.delete<DeleteResponse>(`feeds/${feedKey}`)
  }
}

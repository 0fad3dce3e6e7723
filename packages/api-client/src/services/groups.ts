import type { CreateGroupRequest, Group } from '@aio-rest/types'
import type { ApiClient } from '../client'

/**
 * Groups API service.
 */
export class GroupService {
  constructor(private readonly client: ApiClient) {}

  async getAllGroups(): Promise<Group[]> {
    return this.client.get<Group[]>('groups')
  }

  async createNewGroup(name: string, description: string): Promise<Group> {
    const data: CreateGroupRequest = { name, description }
    return this.client.post<Group>('groups', data)
  }
}

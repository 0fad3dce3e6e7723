import { describe, it, expect, vi, beforeEach } from 'vitest'
import { DataService, createDataRequest } from '../../services/data'
import { ValidationError } from '../../errors'
import { createMockClient } from '../helpers'

describe('DataService', () => {
  let service: DataService
  let mockClient: ReturnType<typeof createMockClient>

  beforeEach(() => {
    vi.clearAllMocks()
    mockClient = createMockClient()
    service = new DataService(mockClient)
  })

  it('should send data to the feed data path', async () => {
    const created = { id: 'd1', value: 'on' }
    vi.mocked(mockClient.post).mockResolvedValue(created)

    const result = await service.sendData('switch', 'on')

    expect(mockClient.post).toHaveBeenCalledWith('feeds/switch/data', {
      value: 'on',
      lat: null,
      lon: null,
      ele: null,
      created_at: null,
    })
    expect(result).toEqual(created)
  })

  it('should send boolean values untouched', async () => {
    vi.mocked(mockClient.post).mockResolvedValue({})

    await service.sendData('door', false, { lat: 1.5 })

    expect(mockClient.post).toHaveBeenCalledWith('feeds/door/data', {
      value: false,
      lat: 1.5,
      lon: null,
      ele: null,
      created_at: null,
    })
  })

  it('should receive the last data point', async () => {
    const point = { id: 'd9', value: '12' }
    vi.mocked(mockClient.get).mockResolvedValue(point)

    const result = await service.receiveData('level')

    expect(mockClient.get).toHaveBeenCalledWith('feeds/level/data/last')
    expect(result).toEqual(point)
  })

  it('should delete a data point by feed and id', async () => {
    vi.mocked(mockClient.delete).mockResolvedValue(null)

    const result = await service.deleteData('level', 'd9')

    expect(mockClient.delete).toHaveBeenCalledWith('feeds/level/data/d9')
    expect(result).toBeNull()
  })

  it('should reject non-finite values before sending', async () => {
    await expect(service.sendData('level', NaN)).rejects.toThrow('value must be a finite number, got NaN')
    await expect(service.sendData('level', Infinity)).rejects.toBeInstanceOf(ValidationError)
    expect(mockClient.post).not.toHaveBeenCalled()
  })

  it('should propagate client errors', async () => {
    vi.mocked(mockClient.get).mockRejectedValue(new Error('Network error'))

    await expect(service.receiveData('level')).rejects.toThrow('Network error')
  })
})

describe('createDataRequest', () => {
  it('should default every optional field to null', () => {
    expect(createDataRequest(3)).toEqual({
      value: 3,
      lat: null,
      lon: null,
      ele: null,
      created_at: null,
    })
  })

  it('should keep zero coordinates', () => {
    expect(createDataRequest(3, { lat: 0, lon: 0, ele: 0 })).toMatchObject({ lat: 0, lon: 0, ele: 0 })
  })

  it('should pass timestamp strings through', () => {
    expect(createDataRequest(3, { createdAt: '2024-05-06T07:08:09Z' }).created_at).toBe(
      '2024-05-06T07:08:09Z'
    )
  })

  it('should format dates as ISO strings', () => {
    const createdAt = new Date(Date.UTC(2024, 4, 6, 7, 8, 9))

    expect(createDataRequest(3, { createdAt }).created_at).toBe('2024-05-06T07:08:09.000Z')
  })

  it('should reject non-finite coordinates', () => {
    expect(() => createDataRequest(3, { lat: Number.NEGATIVE_INFINITY })).toThrow(
      'lat must be a finite number, got -Infinity'
    )
    expect(() => createDataRequest(3, { ele: NaN })).toThrow(ValidationError)
  })
})

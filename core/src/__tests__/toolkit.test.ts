import { createToolkit } from '../toolkit'
import { defaultConfig } from '../config'
import { ConfigurationError } from '../errors'

describe('createToolkit', () => {
  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined)
  })

  afterEach(() => {
    jest.restoreAllMocks()
  })

  it('should connect to the configured database and expose echo plus the query tools', async () => {
    const config = defaultConfig()
    config.database.filename = ':memory:'

    const toolkit = await createToolkit(config)

    expect(toolkit.tools[0].name).toBe('echo')
    expect(toolkit.tools).toHaveLength(13)
    expect(toolkit.ops.getAllAccounts()).toEqual([])
    expect(console.log).toHaveBeenCalledWith(
      '[Tools] Database configuration loaded: file=:memory:, timeout=3000ms'
    )
  })

  it('should release the connection on close', async () => {
    const config = defaultConfig()
    config.database.filename = ':memory:'
    const toolkit = await createToolkit(config)

    toolkit.close()

    expect(() => toolkit.ops.getAllAccounts()).toThrow(ConfigurationError)
  })
})

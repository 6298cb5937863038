import { createEchoTool, formatEcho } from '../tools/echo'

describe('echo tool', () => {
  const fixedClock = () => new Date('2024-05-01T12:00:00.000Z')

  it('should prefix the message with the unix timestamp', () => {
    const result = createEchoTool(fixedClock).call({ message: 'hello' })

    expect(result).toEqual({ content: [{ type: 'text', text: '[1714564800] hello' }] })
  })

  it('should report a missing message', () => {
    const result = createEchoTool(fixedClock).call({})

    expect(result).toEqual({
      content: [{ type: 'text', text: "missing or invalid 'message' parameter" }],
      isError: true,
    })
  })

  it('should report a message that is not a string', () => {
    const result = createEchoTool(fixedClock).call({ message: 42 })

    expect(result.isError).toBe(true)
    expect(result.content[0].text).toBe("missing or invalid 'message' parameter")
  })

  it('should truncate the timestamp to whole seconds', () => {
    expect(formatEcho('ping', new Date(1999))).toBe('[1] ping')
  })
})

import { z } from 'zod';
import { defineTool, textResult, Tool } from './tool';

const EchoParams = z.object({
  message: z.string(),
});

export function formatEcho(message: string, now: Date = new Date()): string {
  const timestamp = Math.floor(now.getTime() / 1000);
  return `[${timestamp}] ${message}`;
}

export function createEchoTool(clock: () => Date = () => new Date()): Tool {
  return defineTool(
    'echo',
    'Echoes back the input message',
    EchoParams,
    ({ message }) => textResult(formatEcho(message, clock()))
  );
}

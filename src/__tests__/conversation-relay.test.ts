import { describe, it, expect, beforeAll, afterAll, beforeEach } from 'vitest';
import express from 'express';
import { OllamaLLMProvider } from '../providers/llm/ollama-llm';
import { ConversationRelay } from '../pipeline/conversation-relay';
import { COMPANION_PROMPTS } from '../prompts/companion-prompts';
import { ConversationTurn, SpeechMetrics, UpstreamError, UpstreamUnavailableError } from '../types';
import { silentLogger, startStubServer, StubServer } from './helpers';

interface RecordedChat {
  model: string;
  stream: boolean;
  messages: ConversationTurn[];
}

const STREAM_CHUNKS = [
  '{"model":"test-model","message":{"role":"assistant","content":"При"},"done":false}\n',
  '{"model":"test-model","message":{"role":"assistant","content":"вет!"},"done":false}\n',
  '{"model":"test-model","message":{"role":"assistant","content":""},"done":true}\n'
];

const lowClarity: SpeechMetrics = {
  avgConfidence: 0.3,
  wordsPerMinute: 40,
  wordCount: 2,
  clarityLevel: 'low'
};

async function collect(stream: AsyncIterable<Buffer>): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(chunk);
  }
  return Buffer.concat(chunks).toString('utf8');
}

describe('ConversationRelay with the Ollama provider', () => {
  let server: StubServer;
  let requests: RecordedChat[] = [];
  let mode: 'ok' | 'fail' | 'empty' | 'slow' | 'hang' = 'ok';
  let hangClosed: Promise<void> = Promise.resolve();
  let signalHangClosed: () => void = () => undefined;

  beforeAll(async () => {
    server = await startStubServer((app) => {
      app.use(express.json());
      app.get('/api/tags', (_req, res) => {
        res.json({ models: [{ name: 'test-model' }] });
      });
      app.post('/api/chat', (req, res) => {
        requests.push(req.body);

        if (mode === 'fail') {
          res.status(500).type('text/plain').send('model runner crashed');
          return;
        }
        if (mode === 'slow') {
          setTimeout(() => {
            if (!res.writableEnded) res.json({ message: { content: 'late' } });
          }, 500);
          return;
        }
        if (mode === 'hang') {
          res.on('close', () => signalHangClosed());
          res.write(STREAM_CHUNKS[0]);
          return;
        }
        if (mode === 'empty') {
          res.json({ done: true });
          return;
        }

        if (req.body.stream) {
          res.type('application/x-ndjson');
          for (const chunk of STREAM_CHUNKS) {
            res.write(chunk);
          }
          res.end();
          return;
        }
        res.json({ model: 'test-model', message: { role: 'assistant', content: 'Привет!' }, done: true });
      });
    });
  });

  afterAll(async () => {
    await server.close();
  });

  beforeEach(() => {
    requests = [];
    mode = 'ok';
    hangClosed = new Promise<void>((resolve) => {
      signalHangClosed = resolve;
    });
  });

  const createRelay = (baseUrl: string = server.baseUrl, timeout?: number) => {
    const llm = new OllamaLLMProvider(
      { type: 'ollama', baseUrl, model: 'default-model', timeout },
      silentLogger()
    );
    return new ConversationRelay(llm, { promptLanguage: 'en' }, silentLogger());
  };

  it('returns the assistant text of a buffered completion with the default model', async () => {
    const reply = await createRelay().complete({ messages: [{ role: 'user', content: 'hi' }] });

    expect(reply).toBe('Привет!');
    expect(requests).toEqual([
      { model: 'default-model', stream: false, messages: [{ role: 'user', content: 'hi' }] }
    ]);
  });

  it('prepends the adaptive system turn when metrics are given', async () => {
    await createRelay().complete(
      { model: 'custom', messages: [{ role: 'user', content: 'kat' }] },
      lowClarity
    );

    expect(requests[0].model).toBe('custom');
    expect(requests[0].messages).toHaveLength(2);
    expect(requests[0].messages[0].role).toBe('system');
    expect(requests[0].messages[0].content).toContain(COMPANION_PROMPTS.en.lowClarity('kat'));
    expect(requests[0].messages[0].content).toContain(COMPANION_PROMPTS.en.slowSpeechCue);
  });

  it('returns an empty string when the backend sends no message', async () => {
    mode = 'empty';
    expect(await createRelay().complete({ messages: [{ role: 'user', content: 'hi' }] })).toBe('');
  });

  it('surfaces a backend 500 as an upstream error without retrying', async () => {
    mode = 'fail';

    const failure = createRelay().complete({ messages: [{ role: 'user', content: 'hi' }] });
    await expect(failure).rejects.toBeInstanceOf(UpstreamError);
    await expect(failure).rejects.toMatchObject({
      statusCode: 502,
      upstreamStatus: 500,
      upstreamBody: 'model runner crashed'
    });
    expect(requests).toHaveLength(1);
  });

  it('converts a buffered timeout into unavailability', async () => {
    mode = 'slow';
    const failure = createRelay(server.baseUrl, 50).complete({ messages: [{ role: 'user', content: 'hi' }] });

    await expect(failure).rejects.toBeInstanceOf(UpstreamUnavailableError);
    await expect(failure).rejects.toMatchObject({ statusCode: 503 });
  });

  it('relays streamed bytes verbatim and in order', async () => {
    const stream = await createRelay().stream(
      { messages: [{ role: 'user', content: 'hi' }] },
      undefined,
      new AbortController().signal
    );

    expect(await collect(stream)).toBe(STREAM_CHUNKS.join(''));
    expect(requests[0]).toEqual({
      model: 'default-model',
      stream: true,
      messages: [{ role: 'user', content: 'hi' }]
    });
  });

  it('reports a non-2xx stream response with its body before relaying', async () => {
    mode = 'fail';
    const failure = createRelay().stream(
      { messages: [{ role: 'user', content: 'hi' }] },
      undefined,
      new AbortController().signal
    );

    await expect(failure).rejects.toMatchObject({ upstreamStatus: 500, upstreamBody: 'model runner crashed' });
    expect(requests).toHaveLength(1);
  });

  it('closes the backend connection when the caller aborts', async () => {
    mode = 'hang';
    const controller = new AbortController();
    const stream = await createRelay().stream(
      { messages: [{ role: 'user', content: 'hi' }] },
      undefined,
      controller.signal
    );

    const iterator = stream[Symbol.asyncIterator]();
    const first = await iterator.next();
    expect(Buffer.from(first.value).toString('utf8')).toBe(STREAM_CHUNKS[0]);

    controller.abort();
    await hangClosed;
  });

  it('reports an unreachable backend as unavailable', async () => {
    const closed = await startStubServer(() => undefined);
    await closed.close();

    await expect(
      createRelay(closed.baseUrl).complete({ messages: [{ role: 'user', content: 'hi' }] })
    ).rejects.toBeInstanceOf(UpstreamUnavailableError);
  });

  it('checks the backend connection without throwing', async () => {
    expect(await createRelay().checkConnection()).toBe(true);

    const closed = await startStubServer(() => undefined);
    await closed.close();
    expect(await createRelay(closed.baseUrl).checkConnection()).toBe(false);
  });
});

import * as http from 'http';
import { AddressInfo } from 'net';
import { OpenAICompletionOracle } from '../../src/infrastructure/oracle/OpenAICompletionOracle';
import { OracleConfig } from '../../src/infrastructure/config/Config';
import { ConfigError } from '../../src/domain/common/Errors';
import { RecordingLogger } from '../helpers';

describe('OpenAICompletionOracle', () => {
  const baseConfig: OracleConfig = {
    apiKey: 'test-secret',
    model: 'test-model',
    temperature: 0,
    timeoutMs: 5000,
    maxRetries: 0
  };

  it('should refuse to start without an API key', () => {
    expect(() => new OpenAICompletionOracle({ ...baseConfig, apiKey: null }, new RecordingLogger())).toThrow(ConfigError);
  });

  describe('against a local endpoint', () => {
    let server: http.Server;
    let baseUrl: string;
    const requests: Array<{ url?: string; body: string }> = [];

    beforeAll(async () => {
      server = http.createServer((req, res) => {
        let body = '';
        req.on('data', chunk => {
          body += chunk;
        });
        req.on('end', () => {
          requests.push({ url: req.url, body });
          res.writeHead(200, { 'Content-Type': 'application/json' });
          res.end(JSON.stringify({
            id: 'chatcmpl-test',
            object: 'chat.completion',
            created: 0,
            model: 'test-model',
            choices: [{ index: 0, message: { role: 'assistant', content: '  buddy_response \n' }, finish_reason: 'stop' }],
            usage: { prompt_tokens: 3, completion_tokens: 1, total_tokens: 4 }
          }));
        });
      });
      await new Promise<void>(resolve => server.listen(0, '127.0.0.1', resolve));
      const address: AddressInfo | string | null = server.address();
      const port = address && typeof address === 'object' ? address.port : 0;
      baseUrl = `http://127.0.0.1:${port}/v1`;
    });

    afterAll(async () => {
      await new Promise<void>(resolve => server.close(() => resolve()));
    });

    it('should send the prompt as one user message and trim the reply', async () => {
      const oracle = new OpenAICompletionOracle({ ...baseConfig, baseUrl }, new RecordingLogger());

      const reply = await oracle.complete('Classify: hello');

      expect(reply).toBe('buddy_response');
      expect(requests[0].url).toBe('/v1/chat/completions');
      expect(JSON.parse(requests[0].body)).toEqual({
        model: 'test-model',
        temperature: 0,
        messages: [{ role: 'user', content: 'Classify: hello' }]
      });
    });
  });
});

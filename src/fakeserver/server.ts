// noinspection HttpUrlsUsage

import {createServer, IncomingMessage, ServerResponse} from 'node:http';

export type FakeHeater = {
  power: 'on' | 'off';
  temperature: number;
  target_temperature: number;
};

export type RecordedRequest = {
  method: string;
  url: string;
  authorization?: string;
  body?: unknown;
};

export type FakeServer = {
  host: string;
  token: string;
  heater: FakeHeater;
  requests: RecordedRequest[];
  // every following request is answered with this status until cleared with null
  failWith: (status: number | null) => void;
  sendMalformedStatus: () => void;
  stop: () => Promise<void>;
};

export function fakeHeater(): FakeHeater {
  return {
    power: 'off',
    temperature: 18,
    target_temperature: 20,
  };
}

function parseBody(req: IncomingMessage): Promise<string> {
  let requestBody = '';
  return new Promise((resolve, reject) => {
    req.on('data', (chunk) => {
      requestBody += chunk;
    });
    req.on('end', () => {
      resolve(requestBody);
    });
    req.on('error', (err) => {
      reject(err);
    });
  });
}

function sendJson(res: ServerResponse, statusCode: number, body: unknown) {
  res.statusCode = statusCode;
  res.setHeader('Content-Type', 'application/json');
  res.end(JSON.stringify(body));
}

function applyPatch(heater: FakeHeater, changes: unknown) {
  if (typeof changes !== 'object' || changes === null) {
    return;
  }
  if ('power' in changes && (changes.power === 'on' || changes.power === 'off')) {
    heater.power = changes.power;
  }
  if ('target_temperature' in changes && typeof changes.target_temperature === 'number') {
    heater.target_temperature = changes.target_temperature;
  }
}

export async function start(): Promise<FakeServer> {
  const hostname = '127.0.0.1';
  const token = 'test-token';
  const heater = fakeHeater();
  const requests: RecordedRequest[] = [];
  let failureStatus: number | null = null;
  let malformed = false;

  const server = createServer((req, res) => {
    parseBody(req).then(rawBody => {
      const body: unknown = rawBody ? JSON.parse(rawBody) : undefined;
      requests.push({method: req.method ?? '', url: req.url ?? '', authorization: req.headers.authorization, body});

      if (req.headers.authorization !== `Bearer ${token}`) {
        res.statusCode = 403;
        res.end('unauthorized');
        return;
      }
      if (failureStatus !== null) {
        res.statusCode = failureStatus;
        res.end();
        return;
      }
      if (req.url !== '/v1/heater') {
        res.statusCode = 404;
        res.end('');
        return;
      }
      if (req.method === 'GET') {
        sendJson(res, 200, malformed ? {power: 'maybe'} : heater);
        return;
      }
      if (req.method === 'PATCH') {
        applyPatch(heater, body);
        sendJson(res, 200, heater);
        return;
      }
      res.statusCode = 405;
      res.end('');
    }).catch(() => {
      res.statusCode = 400;
      res.end('bad request');
    });
  });

  await new Promise<void>(resolve => server.listen(0, hostname, resolve));
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('fake heater is not listening on a TCP port');
  }
  const {port} = address;

  return {
    host: `http://${hostname}:${port}`,
    token,
    heater,
    requests,
    failWith: (status: number | null) => {
      failureStatus = status;
    },
    sendMalformedStatus: () => {
      malformed = true;
    },
    stop: () => {
      server.closeAllConnections();
      return new Promise((resolve) => {
        server.close(() => {
          resolve();
        });
      });
    },
  };
}

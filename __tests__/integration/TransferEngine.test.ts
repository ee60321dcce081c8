/**
 * Tests de integración para core/engines/TransferEngine.ts
 *
 * Transferencias reales contra un servidor HTTP en proceso (127.0.0.1): reanudación por
 * Range, parciales obsoletos, códigos de error y cancelación.
 */
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { TransferEngine, parseContentRange } from '../../core/engines/TransferEngine';
import type { TransferOutcome } from '../../core/engines/types';
import { TRANSFER_ERRORS } from '../../core/constants/errors';
import { makeBody, startTestServer } from '../helpers/testServer';
import type { TestServer } from '../helpers/testServer';

function hasStatus<S extends TransferOutcome['status']>(
  outcome: TransferOutcome,
  status: S
): outcome is Extract<TransferOutcome, { status: S }> {
  return outcome.status === status;
}

function expectStatus<S extends TransferOutcome['status']>(
  outcome: TransferOutcome,
  status: S
): Extract<TransferOutcome, { status: S }> {
  expect(outcome.status).toBe(status);
  if (!hasStatus(outcome, status)) throw new Error(`estado inesperado: ${outcome.status}`);
  return outcome;
}

describe('TransferEngine', () => {
  let server: TestServer;
  let engine: TransferEngine;
  let workDir: string;

  beforeEach(async () => {
    server = await startTestServer();
    engine = new TransferEngine({
      network: { connectTimeout: 2000, responseTimeout: 2000, idleTimeout: 2000 },
    });
    workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'transfer-engine-'));
  });

  afterEach(async () => {
    engine.close();
    await server.close();
    await fs.rm(workDir, { recursive: true, force: true });
  });

  describe('parseContentRange', () => {
    it('debe parsear inicio, fin y total', () => {
      expect(parseContentRange('bytes 100-499/500')).toEqual({ start: 100, end: 499, total: 500 });
    });

    it('debe aceptar total desconocido', () => {
      expect(parseContentRange('bytes 0-9/*')).toEqual({ start: 0, end: 9, total: null });
    });

    it('debe devolver null con cabecera ausente o mal formada', () => {
      expect(parseContentRange(undefined)).toBeNull();
      expect(parseContentRange('items 0-9/10')).toBeNull();
    });
  });

  describe('transferencia completa', () => {
    it('debe descargar el recurso y renombrar el parcial al destino', async () => {
      const body = makeBody(20_000);
      server.setFile('/books/1.txt', body);
      const destination = path.join(workDir, 'nested', '1.txt');
      const progress: number[] = [];

      const outcome = await engine.transfer({
        url: `${server.baseUrl}/books/1.txt`,
        destinationPath: destination,
        expectedSize: body.length,
        onProgress: p => progress.push(p.bytesTransferred),
      });

      const completed = expectStatus(outcome, 'completed');
      expect(completed.bytesTransferred).toBe(20_000);
      expect(completed.bytesReceived).toBe(20_000);
      expect(completed.resumed).toBe(false);
      expect(completed.skipped).toBe(false);
      expect(Buffer.compare(await fs.readFile(destination), body)).toBe(0);
      await expect(fs.stat(`${destination}.part`)).rejects.toThrow();
      expect(progress[progress.length - 1]).toBe(20_000);
      expect(progress.every((value, i) => i === 0 || value > progress[i - 1])).toBe(true);
    });

    it('debe completar sin tamaño esperado', async () => {
      const body = makeBody(3000);
      server.setFile('/a.bin', body);
      const destination = path.join(workDir, 'a.bin');

      const outcome = await engine.transfer({ url: `${server.baseUrl}/a.bin`, destinationPath: destination });

      expect(expectStatus(outcome, 'completed').bytesTransferred).toBe(3000);
      expect(Buffer.compare(await fs.readFile(destination), body)).toBe(0);
    });
  });

  describe('reanudación', () => {
    it('debe reanudar con Range tras un corte y producir un archivo idéntico', async () => {
      const body = makeBody(500_000);
      server.setFile('/big.bin', body, { cutAfterBytes: 100_000 });
      const destination = path.join(workDir, 'big.bin');

      const first = await engine.transfer({
        url: `${server.baseUrl}/big.bin`,
        destinationPath: destination,
        expectedSize: body.length,
      });
      const partial = expectStatus(first, 'partial');
      expect(partial.reason).toBe('interrupted');
      expect(partial.bytesTransferred).toBe(100_000);
      expect((await fs.stat(`${destination}.part`)).size).toBe(100_000);

      const second = await engine.transfer({
        url: `${server.baseUrl}/big.bin`,
        destinationPath: destination,
        expectedSize: body.length,
      });
      const completed = expectStatus(second, 'completed');
      expect(completed.resumed).toBe(true);
      expect(completed.bytesReceived).toBe(400_000);

      const requests = server.requestsFor('/big.bin');
      expect(requests).toHaveLength(2);
      expect(requests[0].range).toBeNull();
      expect(requests[1].range).toBe('bytes=100000-');
      expect(Buffer.compare(await fs.readFile(destination), body)).toBe(0);
    });

    it('debe reescribir desde cero si el servidor ignora Range', async () => {
      const body = makeBody(1000);
      server.setFile('/norange.bin', body, { supportsRange: false });
      const destination = path.join(workDir, 'norange.bin');
      await fs.writeFile(`${destination}.part`, body.subarray(0, 400));

      const outcome = await engine.transfer({
        url: `${server.baseUrl}/norange.bin`,
        destinationPath: destination,
        expectedSize: 1000,
      });

      const completed = expectStatus(outcome, 'completed');
      expect(completed.resumed).toBe(false);
      expect(server.requestsFor('/norange.bin')[0].range).toBe('bytes=400-');
      expect(Buffer.compare(await fs.readFile(destination), body)).toBe(0);
    });

    it('debe convertir un destino incompleto en parcial y reanudarlo', async () => {
      const body = makeBody(2000);
      server.setFile('/short.bin', body);
      const destination = path.join(workDir, 'short.bin');
      await fs.writeFile(destination, body.subarray(0, 500));

      const outcome = await engine.transfer({
        url: `${server.baseUrl}/short.bin`,
        destinationPath: destination,
        expectedSize: 2000,
      });

      expect(expectStatus(outcome, 'completed').resumed).toBe(true);
      expect(server.requestsFor('/short.bin')[0].range).toBe('bytes=500-');
      expect(Buffer.compare(await fs.readFile(destination), body)).toBe(0);
    });

    it('debe completar con 416 cuando el parcial ya contiene todo el recurso', async () => {
      const body = makeBody(1000);
      server.setFile('/done.bin', body);
      const destination = path.join(workDir, 'done.bin');
      await fs.writeFile(`${destination}.part`, body);

      const outcome = await engine.transfer({ url: `${server.baseUrl}/done.bin`, destinationPath: destination });

      const completed = expectStatus(outcome, 'completed');
      expect(completed.bytesTransferred).toBe(1000);
      expect(completed.bytesReceived).toBe(0);
      expect(server.requestsFor('/done.bin')).toHaveLength(1);
      expect(Buffer.compare(await fs.readFile(destination), body)).toBe(0);
    });

    it('no debe dar por completo un 416 cuyo total contradice el tamaño esperado', async () => {
      const body = makeBody(100);
      server.setFile('/shrunk.bin', body);
      const destination = path.join(workDir, 'shrunk.bin');
      await fs.writeFile(`${destination}.part`, body);

      const outcome = await engine.transfer({
        url: `${server.baseUrl}/shrunk.bin`,
        destinationPath: destination,
        expectedSize: 500,
      });

      const failed = expectStatus(outcome, 'failed');
      expect(failed.error.kind).toBe('integrity_mismatch');
      expect(failed.error.message).toBe(`${TRANSFER_ERRORS.SIZE_MISMATCH}: servidor anuncia 100, esperado 500`);
      expect(server.requestsFor('/shrunk.bin').map(r => r.range)).toEqual(['bytes=100-', null]);
      await expect(fs.stat(destination)).rejects.toThrow();
      await expect(fs.stat(`${destination}.part`)).rejects.toThrow();
    });

    it('debe descartar un parcial obsoleto tras 416 y reiniciar una vez', async () => {
      const body = makeBody(1000);
      server.setFile('/stale.bin', body);
      const destination = path.join(workDir, 'stale.bin');
      await fs.writeFile(`${destination}.part`, Buffer.alloc(2000, 1));

      const outcome = await engine.transfer({ url: `${server.baseUrl}/stale.bin`, destinationPath: destination });

      expect(expectStatus(outcome, 'completed').bytesTransferred).toBe(1000);
      const requests = server.requestsFor('/stale.bin');
      expect(requests.map(r => r.range)).toEqual(['bytes=2000-', null]);
      expect(Buffer.compare(await fs.readFile(destination), body)).toBe(0);
    });

    it('debe fallar por integridad si el Content-Range no cuadra con el tamaño esperado', async () => {
      server.setFile('/grown.bin', makeBody(1200));
      const destination = path.join(workDir, 'grown.bin');
      await fs.writeFile(`${destination}.part`, makeBody(300));

      const outcome = await engine.transfer({
        url: `${server.baseUrl}/grown.bin`,
        destinationPath: destination,
        expectedSize: 1000,
      });

      const failed = expectStatus(outcome, 'failed');
      expect(failed.error.kind).toBe('integrity_mismatch');
      expect(server.requestsFor('/grown.bin').map(r => r.range)).toEqual(['bytes=300-', null]);
      await expect(fs.stat(`${destination}.part`)).rejects.toThrow();
      await expect(fs.stat(destination)).rejects.toThrow();
    });
  });

  describe('idempotencia', () => {
    it('no debe hacer ninguna petición si el destino ya está completo', async () => {
      const body = makeBody(800);
      server.setFile('/same.bin', body);
      const destination = path.join(workDir, 'same.bin');
      await fs.writeFile(destination, body);

      const outcome = await engine.transfer({
        url: `${server.baseUrl}/same.bin`,
        destinationPath: destination,
        expectedSize: 800,
      });

      const completed = expectStatus(outcome, 'completed');
      expect(completed.skipped).toBe(true);
      expect(completed.bytesTransferred).toBe(800);
      expect(server.requests).toHaveLength(0);
    });

    it('debe tratar un destino existente como completo si el tamaño es desconocido', async () => {
      const destination = path.join(workDir, 'unknown.bin');
      await fs.writeFile(destination, 'contenido');

      const outcome = await engine.transfer({ url: `${server.baseUrl}/unknown.bin`, destinationPath: destination });

      expect(expectStatus(outcome, 'completed').skipped).toBe(true);
      expect(server.requests).toHaveLength(0);
    });
  });

  describe('errores HTTP', () => {
    it('debe devolver not_found con 404', async () => {
      const outcome = await engine.transfer({
        url: `${server.baseUrl}/missing.txt`,
        destinationPath: path.join(workDir, 'missing.txt'),
      });

      const failed = expectStatus(outcome, 'failed');
      expect(failed.error.kind).toBe('not_found');
      expect(failed.error.statusCode).toBe(404);
    });

    it('debe devolver rate_limited con el Retry-After en ms', async () => {
      server.setRoute('/busy.bin', (_req, res) => {
        res.writeHead(429, { 'Retry-After': '7', 'Content-Length': 0 });
        res.end();
      });

      const outcome = await engine.transfer({
        url: `${server.baseUrl}/busy.bin`,
        destinationPath: path.join(workDir, 'busy.bin'),
      });

      const failed = expectStatus(outcome, 'failed');
      expect(failed.error.kind).toBe('rate_limited');
      expect(failed.error.retryAfterMs).toBe(7000);
    });

    it('debe devolver server_error con 5xx conservando el parcial', async () => {
      server.setRoute('/broken.bin', (_req, res) => {
        res.writeHead(503, { 'Content-Length': 0 });
        res.end();
      });
      const destination = path.join(workDir, 'broken.bin');
      await fs.writeFile(`${destination}.part`, makeBody(50));

      const outcome = await engine.transfer({
        url: `${server.baseUrl}/broken.bin`,
        destinationPath: destination,
        expectedSize: 100,
      });

      const failed = expectStatus(outcome, 'failed');
      expect(failed.error.kind).toBe('server_error');
      expect(failed.bytesTransferred).toBe(50);
      expect((await fs.stat(`${destination}.part`)).size).toBe(50);
    });

    it('debe seguir redirecciones', async () => {
      const body = makeBody(600);
      server.setFile('/real.bin', body);
      server.setRoute('/moved.bin', (_req, res) => {
        res.writeHead(302, { Location: '/real.bin', 'Content-Length': 0 });
        res.end();
      });
      const destination = path.join(workDir, 'moved.bin');

      const outcome = await engine.transfer({ url: `${server.baseUrl}/moved.bin`, destinationPath: destination });

      expect(expectStatus(outcome, 'completed').bytesTransferred).toBe(600);
      expect(Buffer.compare(await fs.readFile(destination), body)).toBe(0);
    });

    it('debe fallar por integridad si el cuerpo supera el tamaño esperado', async () => {
      server.setRoute('/overflow.bin', (_req, res) => {
        res.writeHead(200, { 'Content-Type': 'application/octet-stream' });
        res.write(makeBody(800));
        res.end(makeBody(700));
      });
      const destination = path.join(workDir, 'overflow.bin');

      const outcome = await engine.transfer({
        url: `${server.baseUrl}/overflow.bin`,
        destinationPath: destination,
        expectedSize: 1000,
      });

      expect(expectStatus(outcome, 'failed').error.kind).toBe('integrity_mismatch');
      await expect(fs.stat(`${destination}.part`)).rejects.toThrow();
    });

    it('debe rechazar URLs que no son http(s)', async () => {
      const outcome = await engine.transfer({
        url: 'ftp://127.0.0.1/file.bin',
        destinationPath: path.join(workDir, 'file.bin'),
      });

      expect(expectStatus(outcome, 'failed').error.kind).toBe('invalid_request');
    });
  });

  describe('red', () => {
    it('debe devolver parcial interrumpido con timeout si el socket queda inactivo', async () => {
      const idleEngine = new TransferEngine({
        network: { connectTimeout: 2000, responseTimeout: 2000, idleTimeout: 300 },
      });
      server.setRoute('/stall.bin', (_req, res) => {
        res.writeHead(200, { 'Content-Length': 1000 });
        res.write(makeBody(100));
      });
      const destination = path.join(workDir, 'stall.bin');

      try {
        const outcome = await idleEngine.transfer({
          url: `${server.baseUrl}/stall.bin`,
          destinationPath: destination,
          expectedSize: 1000,
        });

        const partial = expectStatus(outcome, 'partial');
        expect(partial.reason).toBe('interrupted');
        expect(partial.bytesTransferred).toBe(100);
        expect(partial.error?.kind).toBe('timeout');
      } finally {
        idleEngine.close();
      }
    });

    it('debe fallar con connection si no hay servidor escuchando', async () => {
      const closed = await startTestServer();
      const url = `${closed.baseUrl}/x.bin`;
      await closed.close();

      const outcome = await engine.transfer({ url, destinationPath: path.join(workDir, 'x.bin') });

      const failed = expectStatus(outcome, 'failed');
      expect(failed.error.kind).toBe('connection');
      expect(failed.bytesTransferred).toBe(0);
    });
  });

  describe('cancelación', () => {
    it('no debe hacer petición si la señal ya está abortada', async () => {
      const controller = new AbortController();
      controller.abort();

      const outcome = await engine.transfer({
        url: `${server.baseUrl}/any.bin`,
        destinationPath: path.join(workDir, 'any.bin'),
        signal: controller.signal,
      });

      expect(expectStatus(outcome, 'partial').reason).toBe('cancelled');
      expect(server.requests).toHaveLength(0);
    });

    it('debe cerrar el archivo y conservar lo escrito al cancelar a mitad del cuerpo', async () => {
      server.setRoute('/slow.bin', (_req, res) => {
        res.writeHead(200, { 'Content-Length': 10_000 });
        res.write(makeBody(1000));
      });
      const destination = path.join(workDir, 'slow.bin');
      const controller = new AbortController();

      const outcome = await engine.transfer({
        url: `${server.baseUrl}/slow.bin`,
        destinationPath: destination,
        expectedSize: 10_000,
        signal: controller.signal,
        onProgress: () => controller.abort(),
      });

      const partial = expectStatus(outcome, 'partial');
      expect(partial.reason).toBe('cancelled');
      expect(partial.bytesTransferred).toBeGreaterThan(0);
      expect((await fs.stat(`${destination}.part`)).size).toBe(partial.bytesTransferred);
    });
  });
});

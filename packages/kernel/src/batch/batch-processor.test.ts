import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { ConfigurationError, createSafeLogger } from '@nfse-reader/shared';
import type { BatchStartEvent, FileCompleteEvent } from '../events/hooks.js';
import { processBatch, processPaths } from './batch-processor.js';

const quietLogger = createSafeLogger({ level: 'error' });

function invoiceXml(number: string, value: string): string {
  return `<?xml version="1.0" encoding="UTF-8"?>
<CompNfse><Nfse><InfNfse>
  <Numero>${number}</Numero>
  <DataEmissao>2024-03-10</DataEmissao>
  <PrestadorServico>
    <IdentificacaoPrestador><Cnpj>11222333000181</Cnpj></IdentificacaoPrestador>
    <RazaoSocial>Prestadora Teste</RazaoSocial>
  </PrestadorServico>
  <TomadorServico>
    <IdentificacaoTomador><CpfCnpj><Cpf>52998224725</Cpf></CpfCnpj></IdentificacaoTomador>
    <RazaoSocial>Tomador Teste</RazaoSocial>
  </TomadorServico>
  <Servico>
    <Valores><ValorServicos>${value}</ValorServicos></Valores>
    <Discriminacao>Servico ${number}</Discriminacao>
  </Servico>
</InfNfse></Nfse></CompNfse>`;
}

/**
 * ConsultarNfseResposta listing one CompNfse per [number, value] pair
 */
function invoiceListXml(entries: [string, string][]): string {
  const notes = entries.map(([number, value]) => invoiceXml(number, value).replace(/^<\?xml[^>]*\?>\s*/, ''));
  return `<?xml version="1.0" encoding="UTF-8"?>
<ConsultarNfseResposta><ListaNfse>${notes.join('\n')}</ListaNfse></ConsultarNfseResposta>`;
}

describe('processBatch', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'nfse-reader-batch-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  async function writeInvoices(count: number): Promise<string[]> {
    const paths: string[] = [];
    for (let i = 1; i <= count; i++) {
      const path = join(dir, `nota-${String(i).padStart(2, '0')}.xml`);
      await writeFile(path, invoiceXml(String(i), `${i}00,00`), 'utf-8');
      paths.push(path);
    }
    return paths;
  }

  it('should extract the invoice of a complete document', async () => {
    const [path = ''] = await writeInvoices(1);

    const batch = await processBatch([path], { logger: quietLogger });

    expect(batch.results).toEqual([
      {
        status: 'success',
        sourcePath: path,
        invoices: [
          {
            number: '1',
            issueDate: '2024-03-10',
            provider: { legalName: 'Prestadora Teste', taxId: { kind: 'CNPJ', digits: '11222333000181' } },
            recipient: { legalName: 'Tomador Teste', taxId: { kind: 'CPF', digits: '52998224725' } },
            totalServiceValue: '100.00',
            serviceDescription: 'Servico 1',
          },
        ],
      },
    ]);
    expect(batch.cancelled).toBe(false);
    expect(batch.pending).toEqual([]);
  });

  it('should return one result per path in input order, whatever the concurrency', async () => {
    const paths = await writeInvoices(12);
    const shuffled = [...paths].reverse();

    for (const concurrency of [1, 3, 8, 20]) {
      const batch = await processBatch(shuffled, { concurrency, logger: quietLogger });

      expect(batch.results.map((result) => result.sourcePath)).toEqual(shuffled);
      expect(batch.results.every((result) => result.status === 'success')).toBe(true);
    }
  });

  it('should keep every invoice of a file that lists several', async () => {
    const path = join(dir, 'lista.xml');
    await writeFile(path, invoiceListXml([['1', '10,00'], ['2', '20,00'], ['3', '30,00']]), 'utf-8');

    const batch = await processBatch([path], { logger: quietLogger });

    const [result] = batch.results;
    expect(result?.status).toBe('success');
    if (result?.status === 'success') {
      expect(result.invoices.map((invoice) => [invoice.number, invoice.totalServiceValue])).toEqual([
        ['1', '10.00'],
        ['2', '20.00'],
        ['3', '30.00'],
      ]);
    }
    expect(batch.summary.succeeded).toBe(1);
    expect(batch.summary.invoiceCount).toBe(3);
    expect(batch.summary.totalServiceValue).toBe('60.00');
  });

  it('should fail a listing on its first bad invoice and name it', async () => {
    const path = join(dir, 'lista.xml');
    await writeFile(path, invoiceListXml([['1', '10,00'], ['2', 'dez'], ['3', '30,00']]), 'utf-8');

    const batch = await processBatch([path], { logger: quietLogger });

    expect(batch.results).toEqual([
      {
        status: 'failure',
        sourcePath: path,
        failure: { kind: 'NumberFormat', field: 'totalServiceValue', rawValue: 'dez' },
        invoiceIndex: 1,
      },
    ]);
  });

  it('should isolate failures to their file', async () => {
    const [first = '', second = ''] = await writeInvoices(2);
    const broken = join(dir, 'broken.xml');
    const missing = join(dir, 'missing.xml');
    const incomplete = join(dir, 'incomplete.xml');
    await writeFile(broken, '<CompNfse><Nfse>', 'utf-8');
    await writeFile(incomplete, invoiceXml('3', '1,00').replace('<ValorServicos>1,00</ValorServicos>', ''), 'utf-8');

    const batch = await processBatch([first, broken, missing, incomplete, second], {
      concurrency: 2,
      logger: quietLogger,
    });

    expect(batch.results.map((result) => result.status)).toEqual([
      'success',
      'failure',
      'failure',
      'failure',
      'success',
    ]);
    expect(batch.results[2]).toEqual({
      status: 'failure',
      sourcePath: missing,
      failure: { kind: 'IoError', message: 'File not found', code: 'ENOENT' },
    });
    expect(batch.results[3]).toEqual({
      status: 'failure',
      sourcePath: incomplete,
      failure: { kind: 'MissingField', field: 'totalServiceValue' },
    });
    expect(batch.summary).toEqual({
      total: 5,
      succeeded: 2,
      failed: 3,
      invoiceCount: 2,
      failuresByKind: {
        IoError: 1,
        MalformedXml: 1,
        MissingField: 1,
        DateFormat: 0,
        NumberFormat: 0,
        TaxIdFormat: 0,
      },
      totalServiceValue: '300.00',
      durationMs: batch.summary.durationMs,
    });
  });

  it('should fail files over the size limit without reading them', async () => {
    const [path = ''] = await writeInvoices(1);

    const batch = await processBatch([path], { maxFileBytes: 16, logger: quietLogger });

    expect(batch.results).toEqual([
      {
        status: 'failure',
        sourcePath: path,
        failure: { kind: 'IoError', message: 'File exceeds maximum size (16 bytes)', code: 'EFBIG' },
      },
    ]);
  });

  it('should report a directory given as a file', async () => {
    const batch = await processBatch([dir], { logger: quietLogger });

    expect(batch.results).toEqual([
      { status: 'failure', sourcePath: dir, failure: { kind: 'IoError', message: 'Not a regular file' } },
    ]);
  });

  it('should return an empty batch for no paths', async () => {
    const batch = await processBatch([], { logger: quietLogger });

    expect(batch.results).toEqual([]);
    expect(batch.summary.total).toBe(0);
    expect(batch.summary.totalServiceValue).toBe('0.00');
    expect(batch.cancelled).toBe(false);
  });

  it('should reject a concurrency below one', async () => {
    await expect(processBatch([], { concurrency: 0, logger: quietLogger })).rejects.toThrow(ConfigurationError);
  });

  describe('cancellation', () => {
    it('should start nothing when already aborted', async () => {
      const paths = await writeInvoices(3);
      const controller = new AbortController();
      controller.abort();

      const batch = await processBatch(paths, { signal: controller.signal, logger: quietLogger });

      expect(batch.results).toEqual([]);
      expect(batch.pending).toEqual(paths);
      expect(batch.cancelled).toBe(true);
    });

    it('should keep completed results and list the rest as pending', async () => {
      const paths = await writeInvoices(5);
      const controller = new AbortController();

      const batch = await processBatch(paths, {
        concurrency: 1,
        signal: controller.signal,
        logger: quietLogger,
        hooks: {
          onFileComplete: (event) => {
            if (event.index === 1) controller.abort();
          },
        },
      });

      expect(batch.results.map((result) => result.sourcePath)).toEqual(paths.slice(0, 2));
      expect(batch.pending).toEqual(paths.slice(2));
      expect(batch.cancelled).toBe(true);
      expect(batch.summary.total).toBe(2);
    });
  });

  describe('event hooks', () => {
    it('should emit start and per-file events with the run id', async () => {
      const paths = await writeInvoices(2);
      const starts: BatchStartEvent[] = [];
      const files: FileCompleteEvent[] = [];

      await processBatch(paths, {
        concurrency: 1,
        logger: quietLogger,
        idGenerator: { generate: (prefix) => `${prefix ?? 'id'}-test` },
        hooks: {
          onBatchStart: (event) => {
            starts.push(event);
          },
          onFileComplete: (event) => {
            files.push(event);
          },
        },
      });

      expect(starts).toHaveLength(1);
      expect(starts[0]?.runId).toBe('run-test');
      expect(starts[0]?.fileCount).toBe(2);
      expect(files.map((event) => [event.index, event.status])).toEqual([
        [0, 'success'],
        [1, 'success'],
      ]);
    });

    it('should not let a failing hook change the results', async () => {
      const paths = await writeInvoices(3);

      const batch = await processBatch(paths, {
        logger: quietLogger,
        hooks: {
          onFileComplete: () => {
            throw new Error('hook exploded');
          },
          onBatchComplete: () => Promise.reject(new Error('also broken')),
        },
      });

      expect(batch.results).toHaveLength(3);
      expect(batch.summary.succeeded).toBe(3);
    });
  });
});

describe('processPaths', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'nfse-reader-paths-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should process only the XML files of a directory', async () => {
    await writeFile(join(dir, 'a.xml'), invoiceXml('10', '10,00'), 'utf-8');
    await writeFile(join(dir, 'b.xml'), invoiceXml('11', '20,00'), 'utf-8');
    await writeFile(join(dir, 'c.xml'), invoiceXml('12', '30,00'), 'utf-8');
    await writeFile(join(dir, 'notes.txt'), 'not an invoice', 'utf-8');
    await writeFile(join(dir, 'todo.txt'), 'also not an invoice', 'utf-8');

    const { batch, diagnostics } = await processPaths([dir], { logger: quietLogger });

    expect(batch.results).toHaveLength(3);
    expect(batch.results.map((result) => (result.status === 'success' ? result.invoices[0]?.number : null))).toEqual([
      '10',
      '11',
      '12',
    ]);
    expect(batch.summary.totalServiceValue).toBe('60.00');
    expect(diagnostics).toEqual([]);
  });

  it('should pass collection diagnostics through', async () => {
    const missing = join(dir, 'nowhere');

    const { batch, diagnostics } = await processPaths([missing], { logger: quietLogger });

    expect(batch.results).toEqual([]);
    expect(diagnostics.map((diagnostic) => diagnostic.kind)).toEqual(['not-found']);
  });
});

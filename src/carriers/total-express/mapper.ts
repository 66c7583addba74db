import { XMLBuilder, XMLParser } from 'fast-xml-parser';
import { z } from 'zod';
import { QuoteRequest, QuoteResult } from '../../domain/models';
import { MalformedResponseError } from '../../domain/errors';
import { CalcularFreteRequest } from './types';
import { getServiceCodeForTier } from './service-codes';

const CARRIER = 'total-express';
export const SOAP_NAMESPACE = 'urn:calcularFrete';
export const SOAP_ACTION = 'urn:calcularFrete#calcularFrete';

const builder = new XMLBuilder({
    ignoreAttributes: false,
    attributeNamePrefix: '@_',
});
const parser = new XMLParser({
    removeNSPrefix: true,     // soap:, SOAP-ENV:, ns1: all collapse to bare names
    parseTagValue: false,     // keep "01000000" and "11,08" as text
});

const freteResponseSchema = z.object({
    CodigoProc: z.string(),
    DadosFrete: z.object({
        Prazo: z.string().optional(),
        ValorServico: z.string().optional(),
        ValorBase: z.string().optional(),
    }).optional(),
    ErroConsultaFrete: z.unknown().optional(),
});

/** Grams to kilograms with two decimals and a comma, e.g. 5500 -> "5,50". */
export function formatWeightKg(weightGrams: number): string {
    return formatDecimal(weightGrams / 1000);
}
export function formatDecimal(value: number): string {
    return value.toFixed(2).replace('.', ',');
}

export function buildCalcularFreteRequest(request: QuoteRequest): CalcularFreteRequest {
    return {
        TipoServico: getServiceCodeForTier(request.tier),
        CepDestino: request.destinationPostalCode,
        Peso: formatWeightKg(request.weightGrams),
        ValorDeclarado: formatDecimal(request.declaredValue),
        TipoEntrega: '0',
        ServicoCOD: 'false',
        Altura: String(request.dimensions.heightCm),
        Largura: String(request.dimensions.widthCm),
        Profundidade: String(request.dimensions.depthCm),
    };
}
export function buildSoapEnvelope(request: QuoteRequest): string {
    const body = builder.build({
        'soapenv:Envelope': {
            '@_xmlns:soapenv': 'http://schemas.xmlsoap.org/soap/envelope/',
            '@_xmlns:urn': SOAP_NAMESPACE,
            'soapenv:Header': '',
            'soapenv:Body': {
                'urn:calcularFrete': {
                    calcularFreteRequest: buildCalcularFreteRequest(request),
                },
            },
        },
    });
    return `<?xml version="1.0" encoding="utf-8"?>${body}`;
}

export function parseCalcularFreteResponse(raw: unknown): QuoteResult {
    if (typeof raw !== 'string' || raw.trim() === '') {
        throw new MalformedResponseError(CARRIER, 'Empty or non-text response body');
    }

    let doc: unknown;
    try {
        doc = parser.parse(raw);
    } catch (err) {
        throw new MalformedResponseError(
            CARRIER,
            `Response is not valid XML: ${err instanceof Error ? err.message : 'unknown error'}`,
            undefined,
            err instanceof Error ? err : undefined,
        );
    }

    const node = findResultNode(doc, 0);
    if (!node) {
        throw new MalformedResponseError(CARRIER, 'Response missing calcularFreteResponse.CodigoProc');
    }
    const parsed = freteResponseSchema.safeParse(node);
    if (!parsed.success) {
        throw new MalformedResponseError(CARRIER, 'Unexpected calcularFreteResponse structure', {
            issues: parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`),
        });
    }
    const result = parsed.data;

    // CodigoProc other than 1 also covers destinations the provider does not serve
    if (result.CodigoProc.trim() !== '1') {
        throw new MalformedResponseError(CARRIER, `Quote rejected by provider (CodigoProc ${result.CodigoProc})`, {
            codigoProc: result.CodigoProc,
            erro: result.ErroConsultaFrete,
        });
    }

    const moneyCost = parseBrazilianDecimal(result.DadosFrete?.ValorServico);
    if (moneyCost === undefined || moneyCost < 0) {
        throw new MalformedResponseError(CARRIER, 'Response missing numeric DadosFrete.ValorServico', {
            valorServico: result.DadosFrete?.ValorServico,
        });
    }
    const prazo = result.DadosFrete?.Prazo?.trim();
    if (!prazo || !/^\d+$/.test(prazo)) {
        throw new MalformedResponseError(CARRIER, 'Response missing numeric DadosFrete.Prazo', {
            prazo: result.DadosFrete?.Prazo,
        });
    }

    return { moneyCost, timeDays: parseInt(prazo, 10) };
}

/** Accepts "11,08", "11.08" and "1.234,56". */
export function parseBrazilianDecimal(value: string | undefined): number | undefined {
    if (value === undefined) return undefined;
    let text = value.trim();
    if (text.includes(',')) {
        text = text.replace(/\./g, '').replace(',', '.');
    }
    if (!/^\d+(\.\d+)?$/.test(text)) return undefined;
    return parseFloat(text);
}

// The result sits a couple of wrappers deep (Envelope > Body > calcularFreteResponse
// > calcularFreteResponse) and servers disagree on the exact nesting.
function findResultNode(node: unknown, depth: number): Record<string, unknown> | undefined {
    if (depth > 6 || node === null || typeof node !== 'object' || Array.isArray(node)) {
        return undefined;
    }
    const entries = Object.entries(node);
    if (entries.some(([key]) => key === 'CodigoProc')) {
        return Object.fromEntries(entries);
    }
    for (const [, child] of entries) {
        const found = findResultNode(child, depth + 1);
        if (found) return found;
    }
    return undefined;
}

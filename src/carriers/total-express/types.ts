// calcularFrete wire format. The service speaks rpc/encoded SOAP and sends
// every scalar as text, including decimals written with a comma.

export interface CalcularFreteRequest {
    TipoServico: string;      // "STD" | "EXP"
    CepDestino: string;       // 8 digits, zero padded
    Peso: string;             // kg, "5,50"
    ValorDeclarado: string;   // BRL, "0,00"
    TipoEntrega: string;      // 0 = regular delivery
    ServicoCOD: string;       // cash on delivery flag
    Altura: string;           // cm
    Largura: string;
    Profundidade: string;
}

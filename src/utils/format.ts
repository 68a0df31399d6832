/**
 * Formata um número para o padrão de moeda brasileiro (BRL)
 * O Intl separa símbolo e valor com NBSP; trocamos por espaço comum para o SMS.
 */
export function formatCurrency(value: number, currency = "BRL"): string {
    return new Intl.NumberFormat('pt-BR', {
        style: 'currency',
        currency,
        minimumFractionDigits: 2,
        maximumFractionDigits: 2,
    }).format(value).replace(/\s/g, " ");
}

/**
 * Garante o "+" inicial exigido pelo Twilio.
 * Não infere DDI nem remove caracteres: apenas prefixa quando falta.
 */
export function formatPhoneForSms(phone: string): string {
    return phone.startsWith("+") ? phone : `+${phone}`;
}

/**
 * Retorna apenas o primeiro nome de uma string
 */
export function getFirstName(name?: string): string {
    if (!name) return "";
    return name.trim().split(/\s+/)[0] ?? "";
}

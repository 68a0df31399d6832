import { formatCurrency, getFirstName } from "../../../utils/format.js";

export interface ReminderContext {
    nomeLoja: string;
    valor: number; // em reais
    moeda?: string;
    nomeCliente?: string;
    nomeProduto?: string;
    linkPagamento?: string;
}

export const ReminderTemplates = {
    pendingPix: (ctx: ReminderContext): string => {
        const nome = getFirstName(ctx.nomeCliente);
        const saudacao = nome ? `Olá, ${nome}!` : "Olá!";
        const referente = ctx.nomeProduto ? ` referente a ${ctx.nomeProduto}` : "";
        const link = ctx.linkPagamento ? ` Pague aqui: ${ctx.linkPagamento}` : "";

        return `${ctx.nomeLoja}: ${saudacao} Seu PIX de ${formatCurrency(ctx.valor, ctx.moeda)}${referente} ainda está pendente. Finalize o pagamento para garantir seu pedido.${link}`;
    },
};

import type { Account, Customer, Transaction } from "../database/banking";
import type { DocumentMetadata, SourceType } from "../database/types";
import policies from "./policies.json";

/** A document ready to be embedded. */
export interface PendingDocument {
    content: string;
    sourceType: SourceType;
    sourceId: string;
    metadata: DocumentMetadata;
}

export interface BankingPolicy {
    id: string;
    content: string;
}

export const BANKING_POLICIES: readonly BankingPolicy[] = policies;

const TOP_CATEGORY_COUNT = 3;

function toCents(amount: string): number {
    return Math.round(Number.parseFloat(amount) * 100);
}

export function formatCents(cents: number): string {
    return (cents / 100).toFixed(2);
}

export function customerProfileText(customer: Customer): string {
    const parts = [`Customer ${customer.customerId}: ${customer.firstName} ${customer.lastName}`, `email: ${customer.email}`];

    if (customer.phone) parts.push(`phone: ${customer.phone}`);
    if (customer.dateOfBirth) parts.push(`DOB: ${customer.dateOfBirth}`);
    if (customer.addressCity) {
        parts.push(`location: ${customer.addressCity}, ${customer.addressState ?? ""} ${customer.addressZip ?? ""}`.trimEnd());
    }
    if (customer.creditScore !== null) parts.push(`credit score: ${customer.creditScore}`);

    parts.push(
        `customer since: ${customer.customerSince}`,
        `segment: ${customer.segment ?? "UNKNOWN"}`,
        `risk rating: ${customer.riskRating ?? "UNKNOWN"}`
    );

    return parts.join(", ");
}

export function accountSummaryText(account: Account): string {
    const parts = [
        `${account.accountType} account ${account.accountNumber} for customer ${account.customerId} (${account.customerName})`,
        `balance: $${account.balance}`,
    ];

    if (account.interestRate !== null) parts.push(`interest rate: ${account.interestRate}%`);
    if (account.creditLimit !== null) parts.push(`credit limit: $${account.creditLimit}`);

    parts.push(`status: ${account.status}`, `opened: ${account.openedDate}`);
    return parts.join(", ");
}

/**
 * Aggregates an account's transactions: deposit and spending totals, the top
 * spending categories and how often each channel was used.
 */
export function transactionPatternText(account: Account, transactions: Transaction[]): string {
    let depositCents = 0;
    let spendingCents = 0;
    const categorySpend = new Map<string, number>();
    const channelCounts = new Map<string, number>();

    for (const transaction of transactions) {
        const cents = toCents(transaction.amount);
        if (transaction.transactionType === "DEPOSIT") {
            depositCents += cents;
        } else {
            spendingCents += cents;
        }

        if (transaction.merchantCategory) {
            categorySpend.set(
                transaction.merchantCategory,
                (categorySpend.get(transaction.merchantCategory) ?? 0) + cents
            );
        }

        const channel = transaction.channel ?? "UNKNOWN";
        channelCounts.set(channel, (channelCounts.get(channel) ?? 0) + 1);
    }

    const sentences = [
        `Transaction pattern for ${account.accountType} account ${account.accountNumber} (${account.customerName}): ${transactions.length} transactions total.`,
        `Total deposits: $${formatCents(depositCents)}.`,
        `Total spending: $${formatCents(spendingCents)}.`,
    ];

    if (categorySpend.size > 0) {
        const top = [...categorySpend.entries()]
            .sort((a, b) => b[1] - a[1])
            .slice(0, TOP_CATEGORY_COUNT)
            .map(([category, cents]) => `${category} ($${formatCents(cents)})`);
        sentences.push(`Top spending categories: ${top.join(", ")}.`);
    }

    const channels = [...channelCounts.entries()].map(([channel, count]) => `${channel} (${count})`);
    sentences.push(`Channels used: ${channels.join(", ")}.`);

    return sentences.join(" ");
}

export function customerProfileDocument(customer: Customer): PendingDocument {
    return {
        content: customerProfileText(customer),
        sourceType: "CUSTOMER_PROFILE",
        sourceId: customer.customerId,
        metadata: {
            customer_id: customer.customerId,
            segment: customer.segment,
            risk_rating: customer.riskRating,
            credit_score: customer.creditScore ?? 0,
        },
    };
}

export function accountSummaryDocument(account: Account): PendingDocument {
    return {
        content: accountSummaryText(account),
        sourceType: "ACCOUNT_SUMMARY",
        sourceId: account.accountNumber,
        metadata: {
            account_number: account.accountNumber,
            account_type: account.accountType,
            customer_id: account.customerId,
            balance: account.balance,
            status: account.status,
        },
    };
}

export function transactionPatternDocument(account: Account, transactions: Transaction[]): PendingDocument {
    return {
        content: transactionPatternText(account, transactions),
        sourceType: "TRANSACTION_PATTERN",
        sourceId: account.accountNumber,
        metadata: {
            account_number: account.accountNumber,
            customer_id: account.customerId,
            account_type: account.accountType,
        },
    };
}

export function policyDocument(policy: BankingPolicy): PendingDocument {
    return {
        content: policy.content,
        sourceType: "POLICY",
        sourceId: policy.id,
        metadata: { policy_id: policy.id },
    };
}

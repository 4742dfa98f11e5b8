import { describe, expect, it } from "vitest";
import type { Account, Customer, Transaction } from "../database/banking";
import {
    BANKING_POLICIES,
    accountSummaryDocument,
    accountSummaryText,
    customerProfileDocument,
    customerProfileText,
    policyDocument,
    transactionPatternText,
} from "./documents";

const customer: Customer = {
    id: 1,
    customerId: "C00001",
    firstName: "Jane",
    lastName: "Doe",
    email: "jane@example.com",
    phone: "555-0100",
    dateOfBirth: "1985-04-12",
    addressCity: "Austin",
    addressState: "TX",
    addressZip: "73301",
    creditScore: 742,
    customerSince: "2019-06-01",
    segment: "PREMIUM",
    riskRating: "LOW",
};

const account: Account = {
    id: 10,
    accountNumber: "ACC1001",
    accountType: "CHECKING",
    balance: "2500.00",
    interestRate: "0.0010",
    creditLimit: null,
    status: "ACTIVE",
    openedDate: "2020-02-01",
    customerId: "C00001",
    customerName: "Jane Doe",
};

function transaction(
    id: number,
    transactionType: string,
    amount: string,
    merchantCategory: string | null,
    channel: string | null
): Transaction {
    return { id, accountId: 10, transactionType, amount, merchantCategory, channel };
}

describe("customerProfileText", () => {
    it("describes every known field", () => {
        expect(customerProfileText(customer)).toBe(
            "Customer C00001: Jane Doe, email: jane@example.com, phone: 555-0100, DOB: 1985-04-12, "
            + "location: Austin, TX 73301, credit score: 742, customer since: 2019-06-01, segment: PREMIUM, risk rating: LOW"
        );
    });

    it("leaves out missing optional fields", () => {
        expect(
            customerProfileText({
                ...customer,
                customerId: "C00002",
                firstName: "John",
                lastName: "Roe",
                email: "john@example.com",
                phone: null,
                dateOfBirth: null,
                addressCity: null,
                creditScore: null,
                customerSince: "2020-01-15",
                segment: null,
                riskRating: null,
            })
        ).toBe("Customer C00002: John Roe, email: john@example.com, customer since: 2020-01-15, segment: UNKNOWN, risk rating: UNKNOWN");
    });

    it("keys the document by customer id", () => {
        const document = customerProfileDocument(customer);
        expect(document.sourceType).toBe("CUSTOMER_PROFILE");
        expect(document.sourceId).toBe("C00001");
        expect(document.metadata).toEqual({ customer_id: "C00001", segment: "PREMIUM", risk_rating: "LOW", credit_score: 742 });
    });
});

describe("accountSummaryText", () => {
    it("summarises the account and its owner", () => {
        expect(accountSummaryText(account)).toBe(
            "CHECKING account ACC1001 for customer C00001 (Jane Doe), balance: $2500.00, interest rate: 0.0010%, status: ACTIVE, opened: 2020-02-01"
        );
    });

    it("includes a credit limit when there is one", () => {
        expect(
            accountSummaryText({ ...account, accountType: "CREDIT_CARD", balance: "-320.10", interestRate: null, creditLimit: "5000.00" })
        ).toBe(
            "CREDIT_CARD account ACC1001 for customer C00001 (Jane Doe), balance: $-320.10, credit limit: $5000.00, status: ACTIVE, opened: 2020-02-01"
        );
    });

    it("keys the document by account number", () => {
        const document = accountSummaryDocument(account);
        expect(document.sourceType).toBe("ACCOUNT_SUMMARY");
        expect(document.sourceId).toBe("ACC1001");
    });
});

describe("transactionPatternText", () => {
    it("aggregates totals, top categories and channels", () => {
        const transactions = [
            transaction(1, "DEPOSIT", "1000.00", null, "ONLINE"),
            transaction(2, "PAYMENT", "45.50", "GROCERIES", "POS"),
            transaction(3, "WITHDRAWAL", "200.00", null, "ATM"),
            transaction(4, "PAYMENT", "120.25", "DINING", "POS"),
            transaction(5, "PAYMENT", "30.00", "GROCERIES", "MOBILE"),
            transaction(6, "FEE", "35.00", null, null),
            transaction(7, "PAYMENT", "10.00", "TRAVEL", "ONLINE"),
        ];

        expect(transactionPatternText(account, transactions)).toBe(
            "Transaction pattern for CHECKING account ACC1001 (Jane Doe): 7 transactions total. "
            + "Total deposits: $1000.00. Total spending: $440.75. "
            + "Top spending categories: DINING ($120.25), GROCERIES ($75.50), TRAVEL ($10.00). "
            + "Channels used: ONLINE (2), POS (2), ATM (1), MOBILE (1), UNKNOWN (1)."
        );
    });

    it("keeps only the three largest categories", () => {
        const transactions = [
            transaction(1, "PAYMENT", "5.00", "A", "POS"),
            transaction(2, "PAYMENT", "40.00", "B", "POS"),
            transaction(3, "PAYMENT", "30.00", "C", "POS"),
            transaction(4, "PAYMENT", "20.00", "D", "POS"),
        ];

        expect(transactionPatternText(account, transactions)).toContain(
            "Top spending categories: B ($40.00), C ($30.00), D ($20.00)."
        );
    });
});

describe("BANKING_POLICIES", () => {
    it("holds the ten static policies keyed by id", () => {
        expect(BANKING_POLICIES.map((policy) => policy.id)).toEqual([
            "overdraft-policy",
            "interest-rates",
            "fraud-detection",
            "credit-card-rewards",
            "loan-eligibility",
            "customer-segments",
            "dispute-resolution",
            "account-closure",
            "wire-transfer",
            "aml-kyc",
        ]);
        expect(policyDocument(BANKING_POLICIES[0])).toMatchObject({
            sourceType: "POLICY",
            sourceId: "overdraft-policy",
            metadata: { policy_id: "overdraft-policy" },
        });
    });
});

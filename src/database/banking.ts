import type { Queryable } from "./queryable";

export interface Customer {
    id: number;
    customerId: string;
    firstName: string;
    lastName: string;
    email: string;
    phone: string | null;
    dateOfBirth: string | null;
    addressCity: string | null;
    addressState: string | null;
    addressZip: string | null;
    creditScore: number | null;
    customerSince: string;
    segment: string | null;
    riskRating: string | null;
}

export interface Account {
    id: number;
    accountNumber: string;
    accountType: string;
    balance: string;
    interestRate: string | null;
    creditLimit: string | null;
    status: string;
    openedDate: string;
    customerId: string;
    customerName: string;
}

export interface Transaction {
    id: number;
    accountId: number;
    transactionType: string;
    amount: string;
    merchantCategory: string | null;
    channel: string | null;
}

export interface EntityCounts {
    customers: number;
    accounts: number;
    transactions: number;
}

/** Read access to the relational banking entities the index is built from. */
export interface BankingDataSource {
    customers(page: number, pageSize: number): Promise<Customer[]>;
    accounts(page: number, pageSize: number): Promise<Account[]>;
    transactionsForAccount(accountId: number): Promise<Transaction[]>;
    counts(): Promise<EntityCounts>;
}

interface CustomerRow {
    id: string;
    customer_id: string;
    first_name: string;
    last_name: string;
    email: string;
    phone: string | null;
    date_of_birth: string | null;
    address_city: string | null;
    address_state: string | null;
    address_zip: string | null;
    credit_score: number | null;
    customer_since: string;
    segment: string | null;
    risk_rating: string | null;
}

interface AccountRow {
    id: string;
    account_number: string;
    account_type: string;
    balance: string;
    interest_rate: string | null;
    credit_limit: string | null;
    status: string | null;
    opened_date: string;
    customer_code: string;
    first_name: string;
    last_name: string;
}

interface TransactionRow {
    id: string;
    account_id: string;
    transaction_type: string;
    amount: string;
    merchant_category: string | null;
    channel: string | null;
}

// BIGSERIAL ids and DECIMAL columns arrive as strings; dates are cast to text
// so they print as YYYY-MM-DD regardless of the process time zone.
export class PostgresBankingDataSource implements BankingDataSource {
    constructor(private readonly pool: Queryable) {}

    async customers(page: number, pageSize: number): Promise<Customer[]> {
        const result = await this.pool.query<CustomerRow>(
            `SELECT id, customer_id, first_name, last_name, email, phone,
                    date_of_birth::text AS date_of_birth, address_city, address_state, address_zip,
                    credit_score, customer_since::text AS customer_since, segment, risk_rating
             FROM customers
             ORDER BY id
             LIMIT $1 OFFSET $2`,
            [pageSize, page * pageSize]
        );

        return result.rows.map((row) => ({
            id: Number(row.id),
            customerId: row.customer_id,
            firstName: row.first_name,
            lastName: row.last_name,
            email: row.email,
            phone: row.phone,
            dateOfBirth: row.date_of_birth,
            addressCity: row.address_city,
            addressState: row.address_state,
            addressZip: row.address_zip,
            creditScore: row.credit_score,
            customerSince: row.customer_since,
            segment: row.segment,
            riskRating: row.risk_rating,
        }));
    }

    async accounts(page: number, pageSize: number): Promise<Account[]> {
        const result = await this.pool.query<AccountRow>(
            `SELECT a.id, a.account_number, a.account_type, a.balance::text AS balance,
                    a.interest_rate::text AS interest_rate, a.credit_limit::text AS credit_limit,
                    a.status, a.opened_date::text AS opened_date,
                    c.customer_id AS customer_code, c.first_name, c.last_name
             FROM accounts a
             JOIN customers c ON c.id = a.customer_id
             ORDER BY a.id
             LIMIT $1 OFFSET $2`,
            [pageSize, page * pageSize]
        );

        return result.rows.map((row) => ({
            id: Number(row.id),
            accountNumber: row.account_number,
            accountType: row.account_type,
            balance: row.balance,
            interestRate: row.interest_rate,
            creditLimit: row.credit_limit,
            status: row.status ?? "ACTIVE",
            openedDate: row.opened_date,
            customerId: row.customer_code,
            customerName: `${row.first_name} ${row.last_name}`,
        }));
    }

    async transactionsForAccount(accountId: number): Promise<Transaction[]> {
        const result = await this.pool.query<TransactionRow>(
            `SELECT id, account_id, transaction_type, amount::text AS amount, merchant_category, channel
             FROM transactions
             WHERE account_id = $1
             ORDER BY transaction_date`,
            [accountId]
        );

        return result.rows.map((row) => ({
            id: Number(row.id),
            accountId: Number(row.account_id),
            transactionType: row.transaction_type,
            amount: row.amount,
            merchantCategory: row.merchant_category,
            channel: row.channel,
        }));
    }

    async counts(): Promise<EntityCounts> {
        const result = await this.pool.query<{ customers: string; accounts: string; transactions: string }>(
            `SELECT (SELECT COUNT(*) FROM customers) AS customers,
                    (SELECT COUNT(*) FROM accounts) AS accounts,
                    (SELECT COUNT(*) FROM transactions) AS transactions`
        );
        const row = result.rows[0];

        return {
            customers: Number(row?.customers ?? 0),
            accounts: Number(row?.accounts ?? 0),
            transactions: Number(row?.transactions ?? 0),
        };
    }
}

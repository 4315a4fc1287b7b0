import type { TableName, TableRows } from '../types.js';

type ColumnList<T extends TableName> = readonly (keyof TableRows[T] & string)[];

export const TABLE_COLUMNS: { [T in TableName]: ColumnList<T> } = {
  Dim_Customer: ['customer_id', 'age', 'gender', 'location', 'subscription_status', 'frequency_of_purchases'],
  Dim_Item: ['item_name', 'category', 'size', 'color', 'season'],
  Fact_Purchase: [
    'purchase_transaction_id',
    'customer_id',
    'item_name',
    'category',
    'purchase_amount_usd',
    'review_rating',
    'payment_method',
    'shipping_type',
    'discount_applied',
    'promo_code_used',
    'previous_purchases',
    'preferred_payment_method',
  ],
};

export const PRIMARY_KEYS: { [T in TableName]: ColumnList<T> } = {
  Dim_Customer: ['customer_id'],
  Dim_Item: ['item_name', 'category'],
  Fact_Purchase: ['purchase_transaction_id'],
};

export const CREATE_TABLE_STATEMENTS: readonly string[] = [
  `
    create table if not exists Dim_Customer (
      customer_id integer not null,
      age integer,
      gender varchar(10),
      location varchar(50),
      subscription_status varchar(10),
      frequency_of_purchases varchar(50),
      primary key (customer_id)
    )
  `,
  `
    create table if not exists Dim_Item (
      item_name varchar(50) not null,
      category varchar(50) not null,
      size varchar(5),
      color varchar(20),
      season varchar(20),
      primary key (item_name, category)
    )
  `,
  `
    create table if not exists Fact_Purchase (
      purchase_transaction_id integer not null,
      customer_id integer not null references Dim_Customer(customer_id),
      item_name varchar(50) not null,
      category varchar(50) not null,
      purchase_amount_usd numeric(10,2) not null check (purchase_amount_usd >= 0),
      review_rating numeric(3,2) check (review_rating between 0 and 5),
      payment_method varchar(50),
      shipping_type varchar(50),
      discount_applied varchar(5) not null,
      promo_code_used varchar(5) not null,
      previous_purchases integer not null check (previous_purchases >= 0),
      preferred_payment_method varchar(50),
      primary key (purchase_transaction_id),
      foreign key (item_name, category) references Dim_Item(item_name, category)
    )
  `,
];

/** Column widths the store enforces; checked before a row is built. */
export const VARCHAR_LIMITS = {
  gender: 10,
  location: 50,
  subscription_status: 10,
  frequency_of_purchases: 50,
  item_name: 50,
  category: 50,
  size: 5,
  color: 20,
  season: 20,
  payment_method: 50,
  shipping_type: 50,
  preferred_payment_method: 50,
} as const;

import * as v from "valibot";
import { Types, defineEntity, defineType } from "../../src";

/**
 * Order entity, a plain object identified by a number
 */
export const OrderSchema = v.object({
  orderId: v.pipe(v.number(), v.integer()),
  customer: v.string(),
  total: v.number(),
});

export type Order = v.InferOutput<typeof OrderSchema>;

export const OrderType = defineType("Order", (value): value is Order =>
  v.is(OrderSchema, value),
);

export const orderEntity = defineEntity(OrderType, { idType: Types.number });

export const orders: Order[] = [
  { orderId: 1, customer: "alice", total: 30 },
  { orderId: 2, customer: "bob", total: 12.5 },
  { orderId: 3, customer: "alice", total: 99 },
];

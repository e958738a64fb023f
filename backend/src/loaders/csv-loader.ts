import { readFile } from "fs/promises";
import { parse } from "csv-parse/sync";
import { z } from "zod";
import { logger } from "../logger.js";
import { Order, OrderSchema } from "../models/order.js";

const CsvRowsSchema = z.array(z.record(z.string()));

/**
 * Parses an order snapshot. Rows missing an id, status or item are skipped
 * silently; rows with an unknown status are skipped with a warning.
 */
export function parseOrdersCsv(content: string): Order[] {
  const rows = CsvRowsSchema.parse(
    parse(content, {
      columns: true,
      bom: true,
      skip_empty_lines: true,
      relax_column_count: true,
      trim: true,
    }),
  );

  const orders: Order[] = [];

  rows.forEach((row, index) => {
    const { order_id, status, item } = row;
    if (!order_id || !status || !item) {
      return;
    }

    const parsed = OrderSchema.safeParse({ order_id, status, item });
    if (!parsed.success) {
      logger.warn(
        { line: index + 2, orderId: order_id, status },
        "Skipping order row with invalid status",
      );
      return;
    }

    orders.push(parsed.data);
  });

  return orders;
}

export async function loadOrdersFromCsv(filePath: string): Promise<Order[]> {
  logger.debug({ filePath }, "Loading orders from CSV file");

  let content: string;
  try {
    content = await readFile(filePath, "utf-8");
  } catch (error) {
    logger.error({ error, filePath }, "Failed to read order CSV");
    throw new Error(
      `Order CSV not found at ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  const orders = parseOrdersCsv(content);
  logger.debug({ count: orders.length }, "Orders loaded successfully");
  return orders;
}

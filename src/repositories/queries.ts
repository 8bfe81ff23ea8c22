// PostgreSQL text of the query set. Positional parameters only.

export const ping = 'SELECT 1';

// Statement timeout for the rest of the transaction, plus the backend pid used to cancel it
export const prepareTransaction = `SELECT set_config('statement_timeout', $1, true), pg_backend_pid() AS pid`;

export const cancelBackend = 'SELECT pg_cancel_backend($1)';

export const listStock = `
  SELECT art_id, name, stock::text AS stock
  FROM stock
  ORDER BY art_id`;

// "1" when every article covers its amount, "0" otherwise
export const listProductAvailability = `
  SELECT pa.product_name AS name,
         CASE WHEN bool_and(COALESCE(s.stock, 0) >= pa.amount_of) THEN '1' ELSE '0' END AS available
  FROM product_articles pa
  LEFT JOIN stock s ON s.art_id = pa.art_id
  GROUP BY pa.product_name
  ORDER BY pa.product_name`;

export const productExists = `
  SELECT COUNT(*)::int AS count
  FROM product_articles
  WHERE product_name = $1`;

export const productInStock = `
  SELECT COUNT(*)::int AS count
  FROM product_articles pa
  LEFT JOIN stock s ON s.art_id = pa.art_id
  WHERE pa.product_name = $1
    AND COALESCE(s.stock, 0) < pa.amount_of`;

// Fixed lock order keeps concurrent sales sharing articles from deadlocking
export const lockStockForProduct = `
  SELECT s.art_id
  FROM stock s
  JOIN product_articles pa ON pa.art_id = s.art_id
  WHERE pa.product_name = $1
  ORDER BY s.art_id
  FOR UPDATE OF s`;

export const decrementStockForProduct = `
  UPDATE stock s
  SET stock = s.stock - pa.amount_of
  FROM product_articles pa
  WHERE pa.art_id = s.art_id
    AND pa.product_name = $1`;

// Product names are registered once; a second insert violates products_pkey
export const insertProduct = `
  INSERT INTO products (name)
  VALUES ($1)`;

export const insertComposition = `
  INSERT INTO product_articles (product_name, art_id, amount_of)
  VALUES ($1, $2, $3)`;

export const insertStock = `
  INSERT INTO stock (art_id, name, stock)
  VALUES ($1, $2, $3)
  ON CONFLICT (art_id)
  DO UPDATE SET name = EXCLUDED.name, stock = stock.stock + EXCLUDED.stock`;

export const begin = 'BEGIN';
export const commit = 'COMMIT';
export const rollback = 'ROLLBACK';

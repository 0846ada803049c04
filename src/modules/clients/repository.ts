import { query } from '../../db';

export type ClientSummary = {
  id: string;
  name: string;
};

/** Read-only view of the client directory owned by the client service. */
export async function findClientById(id: string): Promise<ClientSummary | null> {
  const { rows } = await query<{ id: string; name: string }>(
    'select id, name from clients where id = $1 and is_deleted = false',
    [id],
  );

  return rows[0] ? { id: rows[0].id, name: rows[0].name } : null;
}

/** Collects the string fields of a submitted form; file parts are dropped. */
export function formToRecord(form: FormData): Record<string, string> {
  const record: Record<string, string> = {};
  form.forEach((value, key) => {
    if (typeof value === "string") record[key] = value;
  });
  return record;
}

export async function readForm(req: Request): Promise<Record<string, string>> {
  try {
    return formToRecord(await req.formData());
  } catch (error) {
    // Bodies that are empty or not form-encoded carry no fields.
    if (error instanceof TypeError) return {};
    throw error;
  }
}

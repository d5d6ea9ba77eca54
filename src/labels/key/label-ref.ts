/**
 * What a caller hands to the renderer: the literal it would have printed plus
 * where it comes from. `explicitKey` skips key derivation.
 */
export interface LabelRef {
  namespace: string;
  category: string;
  defaultText: string;
  explicitKey?: string;
}

export const labelRef = {
  derived(namespace: string, category: string, defaultText: string): LabelRef {
    return { namespace, category, defaultText };
  },

  // The caller guarantees `key` is unique within `namespace`
  keyed(
    namespace: string,
    category: string,
    key: string,
    defaultText: string,
  ): LabelRef {
    return { namespace, category, defaultText, explicitKey: key };
  },
};

// branded number types so that raw numbers are not mixed up with encoded bytes or section indices

export type byte = number & { __type_byte__: void };

export type u32 = bigint & { __type_u32__: void };
export type typeidx = u32 & { __type_idx__: void };
export type funcidx = u32 & { __func_idx__: void };
export type localidx = u32 & { __local_idx__: void };

/**
 * PEG grammar for the record shape notation.
 * Compiled by peggy at runtime.
 */
export const SHAPE_GRAMMAR = `
Module
  = _ records:(r:RecordDecl _ { return r; })*
    {
      return { records: records };
    }

RecordDecl
  = "record" !IdentChar _ name:TypeName _ "{" _ fields:(f:Field _ { return f; })* "}"
    {
      return { name: name, fields: fields };
    }

Field
  = name:Identifier _ ":" _ type:Type _ ";"
    {
      return { name: name, type: type };
    }

Type
  = MapType
  / ElementType
  / VarIntType
  / BytesType
  / PrimitiveType
  / ReferencedType

MapType
  = kind:("sortedmap" / "map") _ "<" _ key:Type _ "," _ value:Type _ ">"
    {
      return { kind: "map", key: key, value: value, sorted: kind === "sortedmap" };
    }

ElementType
  = kind:("vector" / "optional" / "sortedset" / "set") _ "<" _ item:Type _ ">"
    {
      if (kind === "sortedset" || kind === "set") {
        return { kind: "set", item: item, sorted: kind === "sortedset" };
      }
      return { kind: kind, item: item };
    }

VarIntType
  = "varint" _ "<" _ of:IntegerName _ ">"
    {
      return { kind: "varint", of: of };
    }

BytesType
  = "bytes" _ "[" _ size:Number _ "]"
    {
      return { kind: "bytes", fixedSize: size };
    }
  / "bytes" !IdentChar
    {
      return { kind: "bytes" };
    }

PrimitiveType
  = name:(IntegerName / "bool" / "f32" / "f64" / "compactsize" / "string") !IdentChar
    {
      return { kind: "primitive", name: name };
    }

IntegerName
  = name:("u8" / "u16" / "u32" / "u64" / "i8" / "i16" / "i32" / "i64") !IdentChar { return name; }

ReferencedType
  = name:TypeName
    {
      return { kind: "ref", name: name };
    }

TypeName
  = first:[A-Z] rest:IdentChar* { return first + rest.join(""); }

Identifier
  = first:[a-zA-Z_] rest:IdentChar* { return first + rest.join(""); }

IdentChar
  = [A-Za-z0-9_]

Number
  = digits:[0-9]+ { return parseInt(digits.join(""), 10); }

// Whitespace and comments
_
  = (WhiteSpace / Comment)*

WhiteSpace
  = [ \\t\\n\\r]+

Comment
  = "//" [^\\n]* ("\\n" / !.)
`;

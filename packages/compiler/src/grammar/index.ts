import * as ohm from 'ohm-js'

/**
 * Grammar for the compiled PHP subset.
 *
 * Precedence climbs from AssignExpr (loosest) to PrimaryExpr (tightest),
 * following PHP 8: `+`/`-` bind tighter than `.`, `**` is right
 * associative and binds tighter than unary minus.
 *
 * Double-quoted strings keep `{$...}` bodies as raw text; the parser
 * re-matches them from the `Expr` rule.
 */
const grammarSource = String.raw`
Keel {
  Program = phpOpen? TopStatement* phpClose?
  phpOpen = "<?php"
  phpClose = "?>"

  TopStatement = FunctionDecl | ClassDecl | InterfaceDecl | Statement

  // Declarations
  AttributeGroup = "#[" NonemptyListOf<Attribute, ","> ","? "]"
  Attribute = qualifiedName Arguments?

  FunctionDecl = AttributeGroup* kw<"function"> "&"? identifier "(" Params ")" ReturnType? FunctionBody
  Params = ListOf<Param, ","> ","?
  Param = TypeHint? "&"? "..."? variable ParamDefault?
  ParamDefault = "=" Expr
  ReturnType = ":" TypeHint
  TypeHint = "?" qualifiedName -- nullable
           | NonemptyListOf<qualifiedName, "|"> -- union
  FunctionBody = Block -- block
               | ";" -- none

  ClassDecl = AttributeGroup* ClassModifier* kw<"class"> identifier ExtendsClause? ImplementsClause? "{" ClassMember* "}"
  ClassModifier = kw<"abstract"> | kw<"final"> | kw<"readonly">
  ExtendsClause = kw<"extends"> qualifiedName
  ImplementsClause = kw<"implements"> NonemptyListOf<qualifiedName, ",">
  InterfaceDecl = kw<"interface"> identifier InterfaceExtends? "{" ClassMember* "}"
  InterfaceExtends = kw<"extends"> NonemptyListOf<qualifiedName, ",">

  ClassMember = MethodDecl | ConstDecl | PropertyDecl | TraitUse
  MethodDecl = AttributeGroup* MemberModifier* kw<"function"> "&"? identifier "(" Params ")" ReturnType? FunctionBody
  ConstDecl = MemberModifier* kw<"const"> identifier "=" Expr ";"
  PropertyDecl = AttributeGroup* MemberModifier+ TypeHint? variable ParamDefault? ";"
  TraitUse = kw<"use"> NonemptyListOf<qualifiedName, ","> ";"
  MemberModifier = kw<"public"> | kw<"protected"> | kw<"private"> | kw<"static">
                 | kw<"final"> | kw<"abstract"> | kw<"readonly"> | kw<"var">

  // Statements
  Statement = Block
            | IfStmt
            | WhileStmt
            | DoWhileStmt
            | ForStmt
            | ForeachStmt
            | SwitchStmt
            | TryStmt
            | ReturnStmt
            | BreakStmt
            | ContinueStmt
            | ThrowStmt
            | EchoStmt
            | UnsetStmt
            | GlobalStmt
            | StaticVarStmt
            | DeclareStmt
            | RequireStmt
            | NamespaceStmt
            | UseStmt
            | ExprStmt
            | EmptyStmt

  Block = "{" Statement* "}"
  IfStmt = kw<"if"> "(" Expr ")" Statement ElseIfClause* ElseClause?
  ElseIfClause = kw<"elseif"> "(" Expr ")" Statement
  ElseClause = kw<"else"> Statement
  WhileStmt = kw<"while"> "(" Expr ")" Statement
  DoWhileStmt = kw<"do"> Statement kw<"while"> "(" Expr ")" ";"
  ForStmt = kw<"for"> "(" ListOf<Expr, ","> ";" ListOf<Expr, ","> ";" ListOf<Expr, ","> ")" Statement
  ForeachStmt = kw<"foreach"> "(" Expr kw<"as"> ForeachTarget ")" Statement
  ForeachTarget = ForeachVar "=>" ForeachVar -- pair
                | ForeachVar -- value
  ForeachVar = "&"? variable
  SwitchStmt = kw<"switch"> "(" Expr ")" "{" SwitchCase* "}"
  SwitchCase = kw<"case"> Expr caseSeparator Statement* -- case
             | kw<"default"> caseSeparator Statement* -- default
  caseSeparator = ":" | ";"
  TryStmt = kw<"try"> Block CatchClause* FinallyClause?
  CatchClause = kw<"catch"> "(" NonemptyListOf<qualifiedName, "|"> variable? ")" Block
  FinallyClause = kw<"finally"> Block
  ReturnStmt = kw<"return"> Expr? ";"
  BreakStmt = kw<"break"> intLiteral? ";"
  ContinueStmt = kw<"continue"> intLiteral? ";"
  ThrowStmt = kw<"throw"> Expr ";"
  EchoStmt = kw<"echo"> NonemptyListOf<Expr, ","> ";"
  UnsetStmt = kw<"unset"> "(" NonemptyListOf<Expr, ","> ","? ")" ";"
  GlobalStmt = kw<"global"> NonemptyListOf<variable, ","> ";"
  StaticVarStmt = kw<"static"> NonemptyListOf<StaticVarItem, ","> ";"
  StaticVarItem = variable ParamDefault?
  DeclareStmt = kw<"declare"> "(" identifier "=" Expr ")" ";"
  RequireStmt = requireKeyword "(" plainString ")" ";" -- paren
              | requireKeyword plainString ";" -- bare
  NamespaceStmt = kw<"namespace"> qualifiedName ";"
  UseStmt = kw<"use"> NonemptyListOf<qualifiedName, ","> ";"
  ExprStmt = Expr ";"
  EmptyStmt = ";"

  // Expressions, loosest first
  Expr = AssignExpr

  AssignExpr = PostfixExpr assignOp AssignExpr -- assign
             | TernaryExpr

  TernaryExpr = CoalesceExpr "?" AssignExpr ":" AssignExpr -- full
              | CoalesceExpr "?:" AssignExpr -- short
              | CoalesceExpr

  CoalesceExpr = OrExpr coalesceOp CoalesceExpr -- coalesce
               | OrExpr

  OrExpr = OrExpr "||" AndExpr -- or
         | AndExpr

  AndExpr = AndExpr "&&" BitOrExpr -- and
          | BitOrExpr

  BitOrExpr = BitOrExpr bitOrOp BitXorExpr -- bitOr
            | BitXorExpr

  BitXorExpr = BitXorExpr bitXorOp BitAndExpr -- bitXor
             | BitAndExpr

  BitAndExpr = BitAndExpr bitAndOp EqualityExpr -- bitAnd
             | EqualityExpr

  EqualityExpr = EqualityExpr equalityOp RelationalExpr -- op
               | RelationalExpr

  RelationalExpr = RelationalExpr relationalOp ConcatExpr -- op
                 | ConcatExpr

  ConcatExpr = ConcatExpr concatOp ShiftExpr -- concat
             | ShiftExpr

  ShiftExpr = ShiftExpr shiftOp AddExpr -- op
            | AddExpr

  AddExpr = AddExpr addOp MulExpr -- op
          | MulExpr

  MulExpr = MulExpr mulOp InstanceofExpr -- op
          | InstanceofExpr

  InstanceofExpr = UnaryExpr kw<"instanceof"> qualifiedName -- instanceof
                 | UnaryExpr

  UnaryExpr = "!" UnaryExpr -- not
            | "-" ~"-" UnaryExpr -- neg
            | "+" ~"+" UnaryExpr -- plus
            | "~" UnaryExpr -- bitNot
            | "@" UnaryExpr -- silence
            | castOp UnaryExpr -- cast
            | "++" PostfixExpr -- preInc
            | "--" PostfixExpr -- preDec
            | kw<"clone"> UnaryExpr -- clone
            | PowExpr

  PowExpr = IncDecExpr "**" UnaryExpr -- pow
          | IncDecExpr

  IncDecExpr = PostfixExpr "++" -- postInc
             | PostfixExpr "--" -- postDec
             | PostfixExpr

  PostfixExpr = PostfixExpr "[" Expr? "]" -- index
              | PostfixExpr "->" identifier Arguments -- methodCall
              | PostfixExpr "->" identifier -- property
              | PostfixExpr "?->" identifier Arguments? -- nullsafe
              | PostfixExpr "->" variable Arguments? -- dynamicMember
              | PostfixExpr Arguments -- call
              | qualifiedName "::" identifier Arguments -- staticCall
              | qualifiedName "::" variable -- staticProperty
              | qualifiedName "::" identifier -- classConstant
              | PrimaryExpr

  PrimaryExpr = "(" Expr ")" -- paren
              | NewExpr
              | MatchExpr
              | ArrayLiteral
              | kw<"isset"> "(" NonemptyListOf<Expr, ","> ","? ")" -- isset
              | kw<"empty"> "(" Expr ")" -- empty
              | kw<"print"> Expr -- print
              | kw<"eval"> "(" Expr ")" -- eval
              | requireKeyword Expr -- include
              | exitKeyword ("(" Expr? ")")? -- exit
              | kw<"list"> "(" ListOf<ArrayItem, ","> ")" -- list
              | kw<"static"> kw<"function"> "(" Params ")" ClosureUse? ReturnType? Block -- staticClosure
              | kw<"function"> "(" Params ")" ClosureUse? ReturnType? Block -- closure
              | kw<"fn"> "(" Params ")" ReturnType? "=>" Expr -- arrowFunction
              | variableVariable
              | variable
              | literal
              | name -- constant

  ClosureUse = kw<"use"> "(" ListOf<ForeachVar, ","> ")"
  NewExpr = kw<"new"> variable Arguments? -- dynamic
          | kw<"new"> kw<"class"> -- anonymous
          | kw<"new"> qualifiedName Arguments? -- named
  MatchExpr = kw<"match"> "(" Expr ")" "{" ListOf<MatchArm, ","> ","? "}"
  MatchArm = kw<"default"> "=>" Expr -- default
           | NonemptyListOf<Expr, ","> ","? "=>" Expr -- conditions
  ArrayLiteral = "[" ListOf<ArrayItem, ","> ","? "]" -- short
               | kw<"array"> "(" ListOf<ArrayItem, ","> ","? ")" -- long
  ArrayItem = "..." Expr -- spread
            | Expr "=>" "&"? Expr -- pair
            | "&" Expr -- reference
            | Expr -- value
  Arguments = "(" ListOf<Argument, ","> ","? ")"
  Argument = "..." Expr -- spread
           | identifier ":" ~":" Expr -- named
           | Expr -- positional

  // Operators
  assignOp = "**=" | "??=" | "<<=" | ">>=" | "+=" | "-=" | "*=" | "/=" | ".="
           | "%=" | "|=" | "&=" | "^=" | "=" ~("=" | ">")
  coalesceOp = "??" ~"="
  bitOrOp = "|" ~("|" | "=")
  bitXorOp = "^" ~"="
  bitAndOp = "&" ~("&" | "=")
  equalityOp = "===" | "!==" | "<=>" | "==" | "!=" | "<>"
  relationalOp = "<=" ~">" | ">=" | "<" ~("<" | "=" | ">") | ">" ~(">" | "=")
  concatOp = "." ~("=" | digit | ".")
  shiftOp = "<<" ~"=" | ">>" ~"="
  addOp = "+" ~("+" | "=") | "-" ~("-" | "=" | ">")
  mulOp = "*" ~("*" | "=") | "/" ~("=" | "/" | "*") | "%" ~"="
  castOp = "(" " "* castType " "* ")"
  castType = ("integer" | "int" | "float" | "double" | "string" | "boolean" | "bool" | "array" | "object") ~identPart

  // Literals
  literal = floatLiteral | intLiteral | stringLiteral
  floatLiteral = decimalDigits "." decimalDigits exponent? -- dotted
               | decimalDigits exponent -- exponent
  exponent = ("e" | "E") ("+" | "-")? digit+
  intLiteral = "0x" hexDigit+ -- hex
             | "0b" ("0" | "1")+ -- binary
             | decimalDigits -- decimal
  decimalDigits = digit ("_"? digit)*
  stringLiteral = singleQuoted | doubleQuoted
  plainString = singleQuoted | doubleQuoted
  singleQuoted = "'" singleQuotedChar* "'"
  singleQuotedChar = "\\" any -- escape
                   | ~"'" any -- char
  doubleQuoted = "\"" doubleQuotedPart* "\""
  doubleQuotedPart = "\\" escapeSequence -- escape
                   | "{" &"$" bracedBody "}" -- braced
                   | "$" identifier simpleTail? -- variable
                   | ~"\"" any -- char
  escapeSequence = "x" hexDigit hexDigit? -- hex
                 | "u{" hexDigit+ "}" -- unicode
                 | octalDigit octalDigit? octalDigit? -- octal
                 | any -- simple
  octalDigit = "0".."7"
  bracedBody = (~"}" any)*
  simpleTail = "->" identifier -- property
             | "[" simpleIndex "]" -- index
  simpleIndex = "-"? digit+ -- number
              | "$" identifier -- variable
              | identifier -- name

  // Names
  variable = "$" identifier
  variableVariable = "$" "$"+ identifier -- nested
                   | "$" "{" (~"}" any)* "}" -- braced
  identifier = identStart identPart*
  identStart = letter | "_"
  identPart = alnum | "_"
  qualifiedName = "\\"? identifier ("\\" identifier)*
  name = ~reserved qualifiedName
  kw<word> = word ~identPart
  requireKeyword = kw<"require_once"> | kw<"require"> | kw<"include_once"> | kw<"include">
  exitKeyword = kw<"exit"> | kw<"die">
  reserved = kw<"abstract"> | kw<"and"> | kw<"array"> | kw<"as"> | kw<"break"> | kw<"case">
           | kw<"catch"> | kw<"class"> | kw<"clone"> | kw<"const"> | kw<"continue">
           | kw<"declare"> | kw<"default"> | kw<"die"> | kw<"do"> | kw<"echo"> | kw<"else">
           | kw<"elseif"> | kw<"empty"> | kw<"eval"> | kw<"exit"> | kw<"extends">
           | kw<"final"> | kw<"finally"> | kw<"fn"> | kw<"for"> | kw<"foreach">
           | kw<"function"> | kw<"global"> | kw<"if"> | kw<"implements"> | kw<"include_once">
           | kw<"include"> | kw<"instanceof"> | kw<"interface"> | kw<"isset"> | kw<"list">
           | kw<"match"> | kw<"namespace"> | kw<"new"> | kw<"or"> | kw<"print">
           | kw<"private"> | kw<"protected"> | kw<"public"> | kw<"readonly">
           | kw<"require_once"> | kw<"require"> | kw<"return"> | kw<"static">
           | kw<"switch"> | kw<"throw"> | kw<"trait"> | kw<"try"> | kw<"unset"> | kw<"use">
           | kw<"var"> | kw<"while"> | kw<"xor"> | kw<"yield">

  // Comments treated as whitespace
  space += comment
  comment = "//" (~"\n" ~"?>" any)* -- line
          | "#" ~"[" (~"\n" any)* -- hash
          | "/*" (~"*/" any)* "*/" -- block
}
`

/**
 * The compiled grammar.
 */
export const KeelGrammar = ohm.grammar(grammarSource)

/**
 * Match source text against the grammar, optionally from a rule other
 * than `Program`.
 */
export function match(input: string, startRule?: string): ohm.MatchResult {
	return startRule === undefined ? KeelGrammar.match(input) : KeelGrammar.match(input, startRule)
}

/**
 * Trace a parse for debugging purposes.
 */
export function trace(input: string): string {
	return KeelGrammar.trace(input).toString()
}

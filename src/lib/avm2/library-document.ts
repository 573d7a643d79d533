import { CaseStyle } from "kryo";
import { ArrayIoType, ArrayType } from "kryo/array";
import { RecordIoType, RecordType } from "kryo/record";
import { Ucs2StringType } from "kryo/ucs2-string";

const $Name: Ucs2StringType = new Ucs2StringType({maxLength: Infinity});

const $Names: ArrayIoType<string> = new ArrayType({itemType: $Name, maxLength: Infinity});

/**
 * JSON description of one native class. Names are dotted paths:
 * `"flash.display.Sprite"`.
 */
export interface ClassDocument {
  name: string;
  superName?: string;
  methods?: string[];
  staticMethods?: string[];
  fields?: string[];
  staticFields?: string[];
}

export const $ClassDocument: RecordIoType<ClassDocument> = new RecordType<ClassDocument>({
  properties: {
    name: {type: $Name},
    superName: {type: $Name, optional: true},
    methods: {type: $Names, optional: true},
    staticMethods: {type: $Names, optional: true},
    fields: {type: $Names, optional: true},
    staticFields: {type: $Names, optional: true},
  },
  changeCase: CaseStyle.SnakeCase,
});

export interface LibraryDocument {
  classes: ClassDocument[];
}

export const $LibraryDocument: RecordIoType<LibraryDocument> = new RecordType<LibraryDocument>({
  properties: {
    classes: {type: new ArrayType({itemType: $ClassDocument, maxLength: Infinity})},
  },
  changeCase: CaseStyle.SnakeCase,
});

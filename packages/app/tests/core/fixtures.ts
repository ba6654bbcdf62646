import * as Either from "effect/Either"

import { parseDocument } from "../../src/core/parser.js"
import type { Document } from "../../src/core/value.js"

export const ONE_BLOCK_SCRIPT =
  `astver = 2.0\nast = {block_00000 = {{"x"}, text = {ja = {{"hello"}}}, line = 1}}\n`

export const MORNING_SCRIPT = `astver = 2.0
ast = {
	block_00000 = {
		{"savetitle", text="Morning"},
		{"bg", time=500, file="bg_room", path=":bg/"},
		{"fg", ch="Aoi", lv=1.5, id=3},
		{"text"},
		text = {
			vo = {
				{"vo", file="aoi_0001", ch="aoi"},
			},
			ja = {
				{
					name = {"Aoi"},
					"Good morning.",
					{"rt2"},
				},
			},
		},
		linknext = "block_00001",
		line = 12,
	},
	block_00001 = {
		text = {
			ja = {
				{"First line.", {"br"}, "Second line."},
			},
		},
		line = 20,
	},
}
`

export const MORNING_LINES: ReadonlyArray<string> = ["Good morning.", "First line.", "Second line."]

export const parse = (input: string): Document => Either.getOrThrow(parseDocument(input))

import { Cursor, cursorFromString, emptyCursor } from "../dto/envelopes";
import { BadRequestException, Injectable, PipeTransform } from "@nestjs/common";

@Injectable()
export class ParseCursorPipe
	implements PipeTransform<string | undefined, Cursor>
{
	transform(value: string | undefined): Cursor {
		if (!value) {
			return emptyCursor;
		}
		const cursor = cursorFromString(value);
		if (cursor.createdBefore === undefined || cursor.idBefore === undefined) {
			throw new BadRequestException("Invalid cursor");
		}
		return cursor;
	}
}

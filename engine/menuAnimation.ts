import { MENU_TEXT_RANGE, MENU_TEXT_SPEED } from '../constants';

export class MenuTextBob {
    offset = 0;
    private direction = 1;

    step(): number {
        this.offset += MENU_TEXT_SPEED * this.direction;
        if (this.offset >= MENU_TEXT_RANGE || this.offset <= -MENU_TEXT_RANGE) {
            this.direction = -this.direction;
        }
        return this.offset;
    }

    reset(): void {
        this.offset = 0;
        this.direction = 1;
    }
}

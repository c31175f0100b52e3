import {
  Body,
  Controller,
  Delete,
  HttpCode,
  HttpStatus,
  Param,
  Post,
} from '@nestjs/common';
import { ZodValidationPipe } from '../common/pipes/zod-validation.pipe.js';
import { BattlesService } from './battles.service.js';
import { OpenBattleBodySchema, type OpenBattleBody } from './dto/open-battle.dto.js';
import { RunAiTurnBodySchema, type RunAiTurnBody } from './dto/run-ai-turn.dto.js';

@Controller('v1/battles')
export class BattlesController {
  constructor(private readonly battlesService: BattlesService) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  openBattle(@Body(new ZodValidationPipe(OpenBattleBodySchema)) body: OpenBattleBody) {
    return this.battlesService.openBattle(body.battleId);
  }

  @Post(':battleId/ai-turns')
  @HttpCode(HttpStatus.OK)
  async runAiTurn(
    @Param('battleId') battleId: string,
    @Body(new ZodValidationPipe(RunAiTurnBodySchema)) body: RunAiTurnBody,
  ) {
    return this.battlesService.runAiTurn(battleId, body.unitId, body.snapshot);
  }

  @Delete(':battleId')
  closeBattle(@Param('battleId') battleId: string) {
    return this.battlesService.closeBattle(battleId);
  }
}

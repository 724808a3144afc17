import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Owner } from './entities/owner.entity';
import { Unit } from '../units/entities/unit.entity';
import { OwnersService } from './owners.service';
import { OwnersController } from './owners.controller';
import { ActivityModule } from '../activity/activity.module';

@Module({
    imports: [TypeOrmModule.forFeature([Owner, Unit]), ActivityModule],
    controllers: [OwnersController],
    providers: [OwnersService],
    exports: [OwnersService],
})
export class OwnersModule { }
